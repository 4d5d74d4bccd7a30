/**
 * Socket emission utilities: every envelope leaves through these helpers
 */
import { encodeMessage } from "../protocol/codec.js";
import type { ServerMessage } from "../protocol/messages.js";
import type { RelaySocket } from "../socket/types.js";

export const roomChannel = (roomId: string) => `classroom:${roomId}`;

export const userChannel = (roomId: string, userId: string) =>
  `classroom:${roomId}:user:${userId}`;

/**
 * Send an envelope to this socket only
 */
export function sendMessage(socket: RelaySocket, message: ServerMessage): void {
  socket.emit("message", encodeMessage(message));
}

/**
 * Emit an envelope to everyone in the room EXCEPT the sender socket.
 * Works after disconnect too, the broadcast goes through the adapter.
 */
export function broadcastToOthers(
  socket: RelaySocket,
  roomId: string,
  message: ServerMessage,
): void {
  socket.to(roomChannel(roomId)).emit("message", encodeMessage(message));
}

/**
 * Emit an envelope to all users in a room INCLUDING the sender.
 */
export function emitToRoom(
  socket: RelaySocket,
  roomId: string,
  message: ServerMessage,
): void {
  const frame = encodeMessage(message);
  socket.to(roomChannel(roomId)).emit("message", frame);
  socket.emit("message", frame);
}

/**
 * Deliver to every connection of one user in the room
 */
export function sendToUser(
  socket: RelaySocket,
  roomId: string,
  userId: string,
  message: ServerMessage,
): void {
  socket.to(userChannel(roomId, userId)).emit("message", encodeMessage(message));
}
