import type { AppContext } from "../context.js";
import { authMiddleware } from "../auth/middleware.js";
import { handleDisconnect } from "../domains/room/index.js";
import { logger } from "../infrastructure/logger.js";
import { metrics } from "../infrastructure/metrics.js";
import { roomChannel, sendMessage, userChannel } from "../shared/socket.utils.js";
import { createDispatcher } from "./dispatcher.js";
import type { RelayServer, RelaySocket } from "./types.js";

/**
 * Frames of one socket are processed strictly in arrival order, so a
 * `join` is complete before the `update_seat` that follows it runs.
 */
export function registerConnection(socket: RelaySocket, context: AppContext): void {
  const { roomId, user } = socket.data;
  const dispatch = createDispatcher(socket, context);

  let queue: Promise<void> = Promise.resolve();
  const enqueue = (label: string, task: () => Promise<void>): void => {
    queue = queue.then(task).catch((err: unknown) => {
      logger.error({ err, socketId: socket.id, userId: user.id, task: label }, "Relay task failed");
    });
  };

  metrics.socketConnections.inc();
  logger.info({ socketId: socket.id, userId: user.id, roomId }, "Client connected");

  enqueue("connect", async () => {
    await socket.join([roomChannel(roomId), userChannel(roomId, user.id)]);
    sendMessage(socket, { type: "connection_established", room_id: roomId });
  });

  socket.on("message", (frame) => {
    enqueue("message", () => dispatch(frame));
  });

  socket.on("disconnect", (reason) => {
    metrics.socketConnections.dec();
    logger.info({ socketId: socket.id, userId: user.id, roomId, reason }, "Client disconnected");
    enqueue("disconnect", () => handleDisconnect(socket, context));
  });
}

export function initializeSocket(io: RelayServer, context: AppContext): void {
  io.use(authMiddleware);

  io.on("connection", (socket) => {
    registerConnection(socket, context);
  });
}
