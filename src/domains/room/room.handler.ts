import type { AppContext } from "../../context.js";
import type { Participant } from "../../protocol/messages.js";
import type { RelaySocket } from "../../socket/types.js";
import type { ParticipantProfile } from "../participant/participant.types.js";
import { createMessageHandler } from "../../shared/handler.utils.js";
import { broadcastToOthers, sendMessage } from "../../shared/socket.utils.js";
import { logger } from "../../infrastructure/logger.js";
import { metrics } from "../../infrastructure/metrics.js";

export function profileOf(socket: RelaySocket): ParticipantProfile {
  const { user } = socket.data;
  return { id: user.id, display_name: user.displayName, role: user.role };
}

/**
 * Full roster with current seats, the snapshot a (re)joining client
 * reconciles against
 */
export async function buildSnapshot(
  context: AppContext,
  roomId: string,
): Promise<Participant[]> {
  const [profiles, assignments] = await Promise.all([
    context.participants.list(roomId),
    context.seats.getAssignments(roomId),
  ]);
  return profiles.map((profile) => ({
    ...profile,
    seat_id: assignments.get(profile.id) ?? null,
  }));
}

/**
 * join - sent by the client on every (re)connect. The first connection of a
 * user announces them to the room; every join gets the full snapshot.
 */
export const joinHandler = createMessageHandler("join", async (_message, socket, context) => {
  const { roomId } = socket.data;
  const profile = profileOf(socket);

  if (!socket.data.joined) {
    const added = await context.participants.addConnection(
      roomId,
      profile,
      context.settings.maxParticipantsPerRoom,
    );
    if (!added.success) {
      return { success: false, error: added.error };
    }

    socket.data.joined = true;

    if (added.participantCount === 1 && added.connections === 1) {
      metrics.roomsActive.inc();
      logger.info({ roomId }, "Classroom opened");
    }

    if (added.connections === 1) {
      broadcastToOthers(socket, roomId, {
        type: "participant_joined",
        participant: { ...profile, seat_id: null },
      });
    }

    logger.info(
      { roomId, userId: profile.id, connections: added.connections },
      "Participant joined",
    );
  }

  sendMessage(socket, {
    type: "participants_list",
    participants: await buildSnapshot(context, roomId),
  });

  return { success: true };
});

/**
 * Drop one connection; the last one takes the participant (and their seat)
 * out of the room, and the last participant takes the room with them.
 */
export async function handleDisconnect(
  socket: RelaySocket,
  context: AppContext,
): Promise<void> {
  if (!socket.data.joined) return;
  socket.data.joined = false;

  const { roomId, user } = socket.data;
  const removed = await context.participants.removeConnection(roomId, user.id);
  if (!removed.lastConnection) return;

  const released = await context.seats.release(roomId, user.id);
  if (released.success) {
    broadcastToOthers(socket, roomId, {
      type: "seat_left",
      seat_id: released.seatId,
      user_id: user.id,
    });
  }

  broadcastToOthers(socket, roomId, { type: "participant_left", user_id: user.id });
  logger.info({ roomId, userId: user.id }, "Participant left");

  if (removed.participantCount === 0) {
    await Promise.all([context.seats.clearRoom(roomId), context.participants.clearRoom(roomId)]);
    metrics.roomsActive.dec();
    logger.info({ roomId }, "Classroom closed");
  }
}
