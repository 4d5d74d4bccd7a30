import { z } from "zod";
import { logger } from "../infrastructure/logger.js";
import { getRedisClient } from "../infrastructure/redis.js";
import { metrics } from "../infrastructure/metrics.js";
import { config } from "../config/index.js";
import { Errors } from "../shared/errors.js";
import { verifyJwt } from "./jwtValidator.js";
import type { RelaySocket } from "../socket/types.js";

const roomIdSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9_-]+$/);

function readToken(socket: RelaySocket): string | null {
  const fromAuth: unknown = socket.handshake.auth["token"];
  const raw =
    typeof fromAuth === "string" && fromAuth.length > 0
      ? fromAuth
      : socket.handshake.headers.authorization;

  if (!raw) return null;
  // Handle "Bearer " prefix if present in header
  const token = raw.replace(/^Bearer\s+/i, "").trim();
  return token.length > 0 ? token : null;
}

function readRoomId(socket: RelaySocket): string | null {
  const raw = socket.handshake.query["roomId"];
  const parsed = roomIdSchema.safeParse(Array.isArray(raw) ? raw[0] : raw);
  return parsed.success ? parsed.data : null;
}

export async function authMiddleware(
  socket: RelaySocket,
  next: (err?: Error) => void,
): Promise<void> {
  // Browsers always send Origin; native clients may not
  const origin = socket.handshake.headers.origin;
  if (origin && !config.CORS_ORIGINS.has(origin)) {
    logger.warn({ socketId: socket.id, origin }, "Connection from blocked origin");
    metrics.authAttempts.inc({ result: "origin_blocked" });
    return next(new Error(Errors.ORIGIN_NOT_ALLOWED));
  }

  const token = readToken(socket);
  if (!token) {
    logger.warn({ socketId: socket.id }, "Connection attempt without token");
    metrics.authAttempts.inc({ result: "no_token" });
    return next(new Error(Errors.AUTH_REQUIRED));
  }

  const roomId = readRoomId(socket);
  if (!roomId) {
    logger.warn({ socketId: socket.id }, "Connection attempt without room id");
    metrics.authAttempts.inc({ result: "no_room" });
    return next(new Error(Errors.ROOM_REQUIRED));
  }

  try {
    const user = await verifyJwt(token, getRedisClient(), logger);

    if (!user) {
      logger.warn({ socketId: socket.id }, "Invalid token provided");
      metrics.authAttempts.inc({ result: "invalid_token" });
      return next(new Error(Errors.INVALID_CREDENTIALS));
    }

    // The token itself is never kept on the socket
    socket.data = { user, roomId, joined: false };

    metrics.authAttempts.inc({ result: "success" });
    logger.info({ socketId: socket.id, userId: user.id, roomId }, "Client authenticated");
    next();
  } catch (err) {
    logger.error({ err, socketId: socket.id }, "Authentication error");
    metrics.authAttempts.inc({ result: "error" });
    next(new Error(Errors.AUTH_FAILED));
  }
}
