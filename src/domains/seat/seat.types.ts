/**
 * Seat domain types
 */

export type SeatClaimResult =
  | { success: true; seatId: string; previousSeatId: string | null }
  | { success: false; error: string; occupantId: string | null };

export type SeatReleaseResult =
  | { success: true; seatId: string }
  | { success: false; error: string };

/**
 * Authoritative seat occupancy of every room. Claims and releases are
 * atomic: the store alone decides who wins a race for a seat.
 */
export interface SeatStore {
  /** Take a free seat, moving the user out of any seat they held */
  claim(roomId: string, userId: string, seatId: string): Promise<SeatClaimResult>;
  /** Free the user's seat; with `expectedSeatId`, only if it is that seat */
  release(
    roomId: string,
    userId: string,
    expectedSeatId?: string,
  ): Promise<SeatReleaseResult>;
  /** user id → seat id */
  getAssignments(roomId: string): Promise<Map<string, string>>;
  clearRoom(roomId: string): Promise<void>;
}
