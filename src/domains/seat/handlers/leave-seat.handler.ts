/**
 * leave_seat - participant stands up from the seat they hold
 */
import { createMessageHandler } from "../../../shared/handler.utils.js";
import { emitToRoom } from "../../../shared/socket.utils.js";
import { logger } from "../../../infrastructure/logger.js";

export const leaveSeatHandler = createMessageHandler(
  "leave_seat",
  async (message, socket, context) => {
    const { roomId, user } = socket.data;

    const result = await context.seats.release(roomId, user.id, message.seat_id);
    if (!result.success) {
      return { success: false, error: result.error };
    }

    emitToRoom(socket, roomId, {
      type: "seat_left",
      seat_id: result.seatId,
      user_id: user.id,
    });

    logger.info({ roomId, userId: user.id, seatId: result.seatId }, "User left seat");
    return { success: true };
  },
);
