/**
 * Seat Domain - Barrel Export
 */

// Handlers
export { updateSeatHandler } from "./handlers/update-seat.handler.js";
export { leaveSeatHandler } from "./handlers/leave-seat.handler.js";

// Types
export type { SeatClaimResult, SeatReleaseResult, SeatStore } from "./seat.types.js";

// Repository
export { SeatRepository } from "./seat.repository.js";
