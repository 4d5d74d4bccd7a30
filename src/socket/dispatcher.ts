import type { AppContext } from "../context.js";
import type { ClientMessageMap, ClientMessageType } from "../protocol/messages.js";
import { decodeClientMessage, type DecodeFailure } from "../protocol/codec.js";
import { messageHandlers, PRE_JOIN_TYPES, type MessageHandlerTable } from "../domains/index.js";
import { Errors } from "../shared/errors.js";
import { sendMessage } from "../shared/socket.utils.js";
import { logger } from "../infrastructure/logger.js";
import { metrics } from "../infrastructure/metrics.js";
import type { RelaySocket } from "./types.js";

const RATE_WINDOW_SECONDS = 60;

const DECODE_ERRORS: Record<DecodeFailure, string> = {
  malformed_json: Errors.INVALID_JSON,
  not_an_envelope: Errors.INVALID_PAYLOAD,
  unknown_type: Errors.UNKNOWN_MESSAGE,
  invalid_payload: Errors.INVALID_PAYLOAD,
};

function route<K extends ClientMessageType>(
  handlers: MessageHandlerTable,
  type: K,
  message: ClientMessageMap[K],
  socket: RelaySocket,
  context: AppContext,
): Promise<void> {
  return handlers[type](message, socket, context);
}

/**
 * Build the frame handler for one socket. Bad frames are answered with an
 * `error` envelope; the connection stays open.
 */
export function createDispatcher(
  socket: RelaySocket,
  context: AppContext,
  handlers: MessageHandlerTable = messageHandlers,
) {
  return async (frame: unknown): Promise<void> => {
    const { roomId, user } = socket.data;

    let allowed: boolean;
    try {
      allowed = await context.rateLimiter.isAllowed(
        `msg:${roomId}:${user.id}`,
        context.settings.messagesPerMinute,
        RATE_WINDOW_SECONDS,
      );
    } catch (err) {
      logger.error({ err, socketId: socket.id }, "Rate limiter unavailable");
      sendMessage(socket, { type: "error", message: Errors.INTERNAL_ERROR });
      return;
    }

    if (!allowed) {
      metrics.protocolErrors.inc({ reason: "rate_limited" });
      sendMessage(socket, { type: "error", message: Errors.RATE_LIMITED });
      return;
    }

    const decoded = decodeClientMessage(frame);
    if (!decoded.ok) {
      metrics.protocolErrors.inc({ reason: decoded.reason });
      logger.debug(
        { socketId: socket.id, userId: user.id, reason: decoded.reason, detail: decoded.detail },
        "Rejected frame",
      );
      sendMessage(socket, { type: "error", message: DECODE_ERRORS[decoded.reason] });
      return;
    }

    const { message } = decoded;
    if (!socket.data.joined && !PRE_JOIN_TYPES.has(message.type)) {
      metrics.protocolErrors.inc({ reason: "not_joined" });
      sendMessage(socket, { type: "error", message: Errors.NOT_JOINED });
      return;
    }

    await route(handlers, message.type, message, socket, context);
  };
}
