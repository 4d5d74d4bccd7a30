import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("@src/infrastructure/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { ParticipantRepository } from "@src/domains/participant/participant.repository.js";
import { logger } from "@src/infrastructure/logger.js";
import type { Redis } from "ioredis";

function createMockRedis() {
  const redis = {
    eval: vi.fn(),
    hgetall: vi.fn().mockResolvedValue({}),
    del: vi.fn().mockResolvedValue(2),
  };
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  return { redis, client: redis as any as Redis };
}

const ada = { id: "u1", display_name: "Ada", role: "host" as const };

describe("ParticipantRepository", () => {
  let mock: ReturnType<typeof createMockRedis>;
  let repo: ParticipantRepository;

  beforeEach(() => {
    vi.clearAllMocks();
    mock = createMockRedis();
    repo = new ParticipantRepository(mock.client);
  });

  describe("addConnection", () => {
    it("stores the profile and passes the room limit", async () => {
      mock.redis.eval.mockResolvedValue(
        JSON.stringify({ success: true, connections: 1, participantCount: 3 }),
      );

      const result = await repo.addConnection("room1", ada, 30);

      expect(result).toEqual({ success: true, connections: 1, participantCount: 3 });
      expect(mock.redis.eval).toHaveBeenCalledWith(
        expect.any(String),
        2,
        "room:room1:participants",
        "room:room1:connections",
        "u1",
        JSON.stringify(ada),
        "30",
      );
    });

    it("maps ROOM_FULL", async () => {
      mock.redis.eval.mockResolvedValue(JSON.stringify({ success: false, error: "ROOM_FULL" }));

      await expect(repo.addConnection("room1", ada, 1)).resolves.toEqual({
        success: false,
        error: "Classroom is full",
      });
    });

    it("returns an internal error when Redis fails", async () => {
      mock.redis.eval.mockRejectedValue(new Error("Redis down"));

      await expect(repo.addConnection("room1", ada, 30)).resolves.toEqual({
        success: false,
        error: "Internal server error",
      });
    });
  });

  describe("removeConnection", () => {
    it("reports the last connection of a user", async () => {
      mock.redis.eval.mockResolvedValue(
        JSON.stringify({ lastConnection: true, participantCount: 0 }),
      );

      await expect(repo.removeConnection("room1", "u1")).resolves.toEqual({
        lastConnection: true,
        participantCount: 0,
      });
    });

    it("propagates Redis failures", async () => {
      mock.redis.eval.mockRejectedValue(new Error("Redis down"));

      await expect(repo.removeConnection("room1", "u1")).rejects.toThrow("Redis down");
    });
  });

  describe("list", () => {
    it("returns participants ordered by id and skips corrupt entries", async () => {
      mock.redis.hgetall.mockResolvedValue({
        u2: JSON.stringify({ id: "u2", display_name: "Bob", role: "participant" }),
        u1: JSON.stringify(ada),
        u3: "{not json",
        u4: JSON.stringify({ id: "u4" }),
      });

      const list = await repo.list("room1");

      expect(list).toEqual([ada, { id: "u2", display_name: "Bob", role: "participant" }]);
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });
  });

  it("deletes both hashes when a room is cleared", async () => {
    await repo.clearRoom("room1");

    expect(mock.redis.del).toHaveBeenCalledWith("room:room1:participants", "room:room1:connections");
  });
});
