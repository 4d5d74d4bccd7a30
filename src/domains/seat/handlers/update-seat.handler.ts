/**
 * update_seat - participant claims a seat
 *
 * The store decides races. The winner's claim is broadcast to the whole
 * room, sender included, as the confirmation; a loser hears `seat_occupied`.
 */
import { createMessageHandler } from "../../../shared/handler.utils.js";
import { emitToRoom, sendMessage } from "../../../shared/socket.utils.js";
import { Errors } from "../../../shared/errors.js";
import { isSeatInLayout } from "../../../protocol/seats.js";
import { logger } from "../../../infrastructure/logger.js";
import { metrics } from "../../../infrastructure/metrics.js";
import { profileOf } from "../../room/room.handler.js";

export const updateSeatHandler = createMessageHandler(
  "update_seat",
  async (message, socket, context) => {
    const { roomId, user } = socket.data;
    const seatId = message.seat_id;

    if (!isSeatInLayout(seatId, context.settings.layout)) {
      metrics.seatClaims.inc({ result: "invalid" });
      return { success: false, error: Errors.SEAT_INVALID };
    }

    const result = await context.seats.claim(roomId, user.id, seatId);

    if (!result.success) {
      if (result.error !== Errors.SEAT_TAKEN) {
        return { success: false, error: result.error };
      }

      metrics.seatClaims.inc({ result: "taken" });
      sendMessage(socket, {
        type: "seat_occupied",
        seat_id: seatId,
        occupant_id: result.occupantId,
        message: Errors.SEAT_TAKEN,
      });
      return { success: false };
    }

    metrics.seatClaims.inc({ result: "claimed" });

    if (result.previousSeatId) {
      emitToRoom(socket, roomId, {
        type: "seat_left",
        seat_id: result.previousSeatId,
        user_id: user.id,
      });
    }

    emitToRoom(socket, roomId, {
      type: "seat_updated",
      seat_id: result.seatId,
      user: { ...profileOf(socket), seat_id: result.seatId },
    });

    logger.info(
      { roomId, userId: user.id, seatId, previousSeatId: result.previousSeatId },
      "User took seat",
    );

    return { success: true };
  },
);
