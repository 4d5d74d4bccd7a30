import Fastify from "fastify";
import { Server } from "socket.io";
import { createAdapter } from "@socket.io/redis-adapter";
import type { Redis } from "ioredis";
import fs from "node:fs";
import { config } from "../config/index.js";
import type { AppContext } from "../context.js";
import { SeatRepository } from "../domains/seat/seat.repository.js";
import { ParticipantRepository } from "../domains/participant/participant.repository.js";
import { initializeSocket } from "../socket/index.js";
import type {
  ClientToServerEvents,
  InterServerEvents,
  RelayServer,
  ServerToClientEvents,
  SocketData,
} from "../socket/types.js";
import { RateLimiter } from "../utils/rateLimiter.js";
import { getRedisClient } from "./redis.js";
import { createHealthRoutes } from "./health.js";
import { createMetricsRoutes, metrics } from "./metrics.js";
import { logger } from "./logger.js";

function createHttpServer() {
  // Configure HTTPS if certificates are provided; `https: null` serves plain HTTP
  const httpsOptions =
    config.SSL_KEY_PATH && config.SSL_CERT_PATH
      ? {
          key: fs.readFileSync(config.SSL_KEY_PATH),
          cert: fs.readFileSync(config.SSL_CERT_PATH),
        }
      : null;

  return Fastify({ loggerInstance: logger, https: httpsOptions });
}

export type HttpServer = ReturnType<typeof createHttpServer>;

export interface BootstrapResult {
  server: HttpServer;
  io: RelayServer;
  subClient: Redis;
}

export function createAppContext(redis: Redis): AppContext {
  return {
    seats: new SeatRepository(redis),
    participants: new ParticipantRepository(redis),
    rateLimiter: new RateLimiter(redis),
    settings: {
      layout: { rows: config.CLASSROOM_ROWS, columns: config.CLASSROOM_COLUMNS },
      maxParticipantsPerRoom: config.MAX_PARTICIPANTS_PER_ROOM,
      messagesPerMinute: config.RATE_LIMIT_MESSAGES_PER_MINUTE,
    },
  };
}

export async function bootstrapServer(): Promise<BootstrapResult> {
  const fastify = createHttpServer();

  // Setup Socket.IO with Redis adapter for horizontal scaling
  const pubClient = getRedisClient();
  const subClient = pubClient.duplicate();

  const io: RelayServer = new Server<
    ClientToServerEvents,
    ServerToClientEvents,
    InterServerEvents,
    SocketData
  >(fastify.server, {
    cors: {
      origin: [...config.CORS_ORIGINS],
      methods: ["GET", "POST"],
      credentials: true,
    },
    adapter: createAdapter(pubClient, subClient),
  });

  initializeSocket(io, createAppContext(pubClient));

  // Register health check
  await fastify.register(createHealthRoutes(pubClient));

  // Register metrics
  await fastify.register(
    createMetricsRoutes({
      connections: () => io.engine.clientsCount,
      rooms: async () => {
        const gauge = await metrics.roomsActive.get();
        return gauge.values[0]?.value ?? 0;
      },
    }),
  );

  // Return subClient for proper cleanup during graceful shutdown
  return { server: fastify, io, subClient };
}
