/**
 * Relay handler utilities
 * Provides a createMessageHandler wrapper for consistent error handling, logging and metrics
 */
import type { ClientMessageMap, ClientMessageType } from "../protocol/messages.js";
import type { RelaySocket } from "../socket/types.js";
import type { AppContext } from "../context.js";
import { logger } from "../infrastructure/logger.js";
import { metrics } from "../infrastructure/metrics.js";
import { generateCorrelationId } from "./crypto.js";
import { Errors } from "./errors.js";
import { sendMessage } from "./socket.utils.js";

/**
 * Standard handler result shape.
 * A failed result with `error` answers the sender with an `error` envelope;
 * handlers that reply with their own rejection envelope leave it out.
 */
export type HandlerResult = { success: true } | { success: false; error?: string };

type HandlerFn<T extends ClientMessageType> = (
  message: ClientMessageMap[T],
  socket: RelaySocket,
  context: AppContext,
) => Promise<HandlerResult>;

export type MessageHandler<T extends ClientMessageType> = (
  message: ClientMessageMap[T],
  socket: RelaySocket,
  context: AppContext,
) => Promise<void>;

/**
 * Wrap a message handler with:
 * - Centralized error handling
 * - Logging with correlation IDs
 * - Metrics tracking
 *
 * Payload validation already happened in the codec, so handlers receive
 * the narrowed envelope for their `type`.
 *
 * @example
 * ```typescript
 * export const pingHandler = createMessageHandler("ping", async (_message, socket) => {
 *   sendMessage(socket, { type: "pong" });
 *   return { success: true };
 * });
 * ```
 */
export function createMessageHandler<T extends ClientMessageType>(
  type: T,
  handler: HandlerFn<T>,
): MessageHandler<T> {
  return async (message, socket, context) => {
    const startTime = Date.now();
    const requestId = generateCorrelationId();
    const userId = socket.data.user.id;

    try {
      const result = await handler(message, socket, context);
      const durationMs = Date.now() - startTime;

      metrics.messagesTotal.inc({ type, status: result.success ? "success" : "rejected" });
      metrics.messageLatency.observe({ type }, durationMs / 1000);

      logger.debug(
        { requestId, type, userId, success: result.success, durationMs },
        "Handler completed",
      );

      if (!result.success && result.error) {
        sendMessage(socket, { type: "error", message: result.error });
      }
    } catch (err) {
      const durationMs = Date.now() - startTime;
      metrics.messagesTotal.inc({ type, status: "error" });

      logger.error({ err, requestId, type, userId, durationMs }, "Handler exception");

      sendMessage(socket, { type: "error", message: Errors.INTERNAL_ERROR });
    }
  };
}
