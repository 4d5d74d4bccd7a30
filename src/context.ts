import type { SeatLayout } from "./protocol/seats.js";
import type { SeatStore } from "./domains/seat/seat.types.js";
import type { ParticipantStore } from "./domains/participant/participant.types.js";
import type { MessageRateLimiter } from "./utils/rateLimiter.js";

export interface RelaySettings {
  layout: SeatLayout;
  maxParticipantsPerRoom: number;
  messagesPerMinute: number;
}

export interface AppContext {
  seats: SeatStore;
  participants: ParticipantStore;
  rateLimiter: MessageRateLimiter;
  settings: RelaySettings;
}
