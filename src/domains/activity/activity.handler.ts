import { createMessageHandler } from "../../shared/handler.utils.js";
import { Errors } from "../../shared/errors.js";
import { emitToRoom } from "../../shared/socket.utils.js";

/**
 * Content put up from a participant's laptop. The sender's id and name come
 * from the authenticated socket, never from the payload.
 */
export const sharedContentHandler = createMessageHandler(
  "shared_content",
  async (message, socket) => {
    const { roomId, user } = socket.data;
    emitToRoom(socket, roomId, {
      type: "content_shared",
      user_id: user.id,
      display_name: user.displayName,
      content_type: message.content_type,
      content_url: message.content_url,
      description: message.description ?? "",
    });
    return { success: true };
  },
);

export const updateRoundHandler = createMessageHandler(
  "update_round",
  async (message, socket) => {
    const { roomId, user } = socket.data;
    if (user.role !== "host") {
      return { success: false, error: Errors.HOST_ONLY };
    }

    emitToRoom(socket, roomId, {
      type: "round_updated",
      status: message.status,
      current_user_id: message.current_user_id,
      time_remaining: message.time_remaining,
      completed_user_ids: message.completed_user_ids,
    });
    return { success: true };
  },
);
