/**
 * Media negotiation relay
 *
 * Offers, answers and ICE candidates are opaque to the relay. They go to
 * every connection of the target user, stamped with the sender's id from
 * the authenticated socket; a client never names itself as sender.
 */
import { createMessageHandler } from "../../shared/handler.utils.js";
import { sendToUser } from "../../shared/socket.utils.js";
import { Errors } from "../../shared/errors.js";

export const offerHandler = createMessageHandler("offer", async (message, socket) => {
  const { roomId, user } = socket.data;
  if (message.target_id === user.id) {
    return { success: false, error: Errors.INVALID_TARGET };
  }

  sendToUser(socket, roomId, message.target_id, {
    type: "offer",
    sender_id: user.id,
    description: message.description,
  });
  return { success: true };
});

export const answerHandler = createMessageHandler("answer", async (message, socket) => {
  const { roomId, user } = socket.data;
  if (message.target_id === user.id) {
    return { success: false, error: Errors.INVALID_TARGET };
  }

  sendToUser(socket, roomId, message.target_id, {
    type: "answer",
    sender_id: user.id,
    description: message.description,
  });
  return { success: true };
});

export const iceCandidateHandler = createMessageHandler(
  "ice-candidate",
  async (message, socket) => {
    const { roomId, user } = socket.data;
    if (message.target_id === user.id) {
      return { success: false, error: Errors.INVALID_TARGET };
    }

    sendToUser(socket, roomId, message.target_id, {
      type: "ice-candidate",
      sender_id: user.id,
      candidate: message.candidate,
    });
    return { success: true };
  },
);
