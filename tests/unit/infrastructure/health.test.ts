import { describe, it, expect, afterEach } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";
import type { Redis } from "ioredis";
import { createHealthRoutes } from "@src/infrastructure/health.js";

async function buildApp(redisStatus: string): Promise<FastifyInstance> {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  const redis = { status: redisStatus } as any as Redis;
  const app = Fastify();
  await app.register(createHealthRoutes(redis));
  return app;
}

describe("GET /health", () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it("is ok while Redis is ready", async () => {
    app = await buildApp("ready");

    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: "ok", redis: "ready" });
  });

  it("is degraded with 503 without Redis", async () => {
    app = await buildApp("reconnecting");

    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({ status: "degraded", redis: "reconnecting" });
  });
});
