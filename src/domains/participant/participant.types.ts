import type { Participant } from "../../protocol/messages.js";

/** A participant as stored; the seat lives in the seat store */
export type ParticipantProfile = Omit<Participant, "seat_id">;

export type AddConnectionResult =
  | { success: true; connections: number; participantCount: number }
  | { success: false; error: string };

export interface RemoveConnectionResult {
  /** True when this was the user's last open connection in the room */
  lastConnection: boolean;
  participantCount: number;
}

/**
 * Room membership. A user may hold several connections (tabs) to the same
 * room; they are a participant until the last one closes.
 */
export interface ParticipantStore {
  addConnection(
    roomId: string,
    profile: ParticipantProfile,
    maxParticipants: number,
  ): Promise<AddConnectionResult>;
  removeConnection(roomId: string, userId: string): Promise<RemoveConnectionResult>;
  list(roomId: string): Promise<ParticipantProfile[]>;
  clearRoom(roomId: string): Promise<void>;
}
