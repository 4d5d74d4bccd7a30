import type { ParticipantRole, RoundStatus, SharedContentType } from "../../protocol/messages.js";
import type { Interactable } from "./interaction.js";

export type LocalSeatState =
  | { kind: "standing" }
  | { kind: "seated"; seatId: string; /** false until the relay confirms the claim */ confirmed: boolean };

export interface Occupant {
  id: string;
  displayName: string;
  role: ParticipantRole;
  seatId: string | null;
  /** False while our relay connection is down and the roster may be stale */
  connected: boolean;
}

export interface SeatLabel {
  userId: string;
  displayName: string;
  isSelf: boolean;
  pending: boolean;
}

export type ConnectionIndicator = "connecting" | "connected" | "reconnecting" | "disconnected";

export type NotificationLevel = "info" | "warning" | "error";

export type VoiceFailureReason = "permission_denied" | "device_not_found" | "unavailable";

export type VoiceStatus =
  | { kind: "initializing" }
  | { kind: "active"; muted: boolean }
  | { kind: "disabled"; reason: VoiceFailureReason };

export interface SharedContent {
  userId: string;
  displayName: string;
  isSelf: boolean;
  contentType: SharedContentType;
  url: string;
  description: string;
}

export interface RoundState {
  status: RoundStatus;
  currentUserId: string | null;
  timeRemainingSeconds: number;
  completedUserIds: readonly string[];
}

export interface RoundView extends RoundState {
  /** Null when the speaker is not in our roster */
  currentDisplayName: string | null;
}

/**
 * Everything the classroom shows. The controllers never touch the page
 * directly; a DOM implementation lives in `client/dom`.
 */
export interface ClassroomView {
  renderSeat(seatId: string, label: SeatLabel | null): void;
  renderOccupants(occupants: readonly Occupant[], selfId: string): void;
  renderLocalState(state: LocalSeatState): void;
  renderHand(userId: string, raised: boolean): void;
  renderSpeaking(userId: string, speaking: boolean): void;
  notify(message: string, level: NotificationLevel): void;
  setConnectionStatus(status: ConnectionIndicator): void;
  setNearbyInteractable(target: Interactable | null): void;
  openInteractable(target: Interactable): void;
  setVoiceStatus(status: VoiceStatus): void;
  showSharedContent(content: SharedContent): void;
  renderRound(round: RoundView): void;
}
