import type { Server, Socket } from "socket.io";
import type { ClassroomUser } from "../auth/types.js";
import type { ClientToServerEvents, ServerToClientEvents } from "../protocol/events.js";

export type { ClientToServerEvents, ServerToClientEvents };

export type InterServerEvents = Record<string, never>;

export interface SocketData {
  user: ClassroomUser;
  roomId: string;
  /** Set by the `join` handler; gates every other message type */
  joined: boolean;
}

export type RelayServer = Server<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>;

export type RelaySocket = Socket<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>;
