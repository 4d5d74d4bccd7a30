import { describe, it, expect, vi, beforeEach } from "vitest";
import { RateLimiter } from "@src/utils/rateLimiter.js";
import type { Redis } from "ioredis";

function createMockRedis(execResult: unknown) {
  const multi = {
    incr: vi.fn().mockReturnThis(),
    expire: vi.fn().mockReturnThis(),
    exec: vi.fn().mockResolvedValue(execResult),
  };
  const redis = { multi: vi.fn().mockReturnValue(multi) };
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  return { multi, client: redis as any as Redis };
}

describe("RateLimiter", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("increments a prefixed key with an expiry set once", async () => {
    const { multi, client } = createMockRedis([
      [null, 1],
      [null, 1],
    ]);

    await new RateLimiter(client).isAllowed("msg:room1:u1", 10, 60);

    expect(multi.incr).toHaveBeenCalledWith("ratelimit:msg:room1:u1");
    expect(multi.expire).toHaveBeenCalledWith("ratelimit:msg:room1:u1", 60, "NX");
  });

  it("allows up to the limit", async () => {
    const { client } = createMockRedis([
      [null, 10],
      [null, 0],
    ]);

    await expect(new RateLimiter(client).isAllowed("k", 10, 60)).resolves.toBe(true);
  });

  it("refuses once the count passes the limit", async () => {
    const { client } = createMockRedis([
      [null, 11],
      [null, 0],
    ]);

    await expect(new RateLimiter(client).isAllowed("k", 10, 60)).resolves.toBe(false);
  });

  it("refuses when the transaction was aborted", async () => {
    const { client } = createMockRedis(null);

    await expect(new RateLimiter(client).isAllowed("k", 10, 60)).resolves.toBe(false);
  });

  it("refuses when the increment failed", async () => {
    const { client } = createMockRedis([[new Error("WRONGTYPE"), null]]);

    await expect(new RateLimiter(client).isAllowed("k", 10, 60)).resolves.toBe(false);
  });
});
