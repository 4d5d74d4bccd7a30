import { createMessageHandler } from "../../shared/handler.utils.js";
import { emitToRoom, sendMessage } from "../../shared/socket.utils.js";

export const handRaiseHandler = createMessageHandler(
  "hand_raise",
  async (message, socket) => {
    const { roomId, user } = socket.data;
    emitToRoom(socket, roomId, {
      type: "hand_raised",
      user_id: user.id,
      raised: message.raised,
    });
    return { success: true };
  },
);

// Keepalive, answered before join as well
export const pingHandler = createMessageHandler("ping", async (_message, socket) => {
  sendMessage(socket, { type: "pong" });
  return { success: true };
});
