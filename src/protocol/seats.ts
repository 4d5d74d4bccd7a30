/**
 * Seat identifiers and classroom layouts
 *
 * Seats are addressed as `seat-<row>-<col>` (zero-based), stable for the
 * lifetime of a room's layout.
 */
import { z } from "zod";

export interface SeatLayout {
  rows: number;
  columns: number;
}

export interface SeatPosition {
  row: number;
  column: number;
}

export const DEFAULT_SEAT_LAYOUT: Readonly<SeatLayout> = { rows: 5, columns: 6 };

const SEAT_ID_PATTERN = /^seat-(\d{1,3})-(\d{1,3})$/;

export const seatIdSchema = z
  .string()
  .regex(SEAT_ID_PATTERN, { message: "Seat id must look like seat-<row>-<col>" });

export const seatLayoutSchema = z.object({
  rows: z.number().int().positive().max(50),
  columns: z.number().int().positive().max(50),
});

export function formatSeatId(row: number, column: number): string {
  return `seat-${row}-${column}`;
}

export function parseSeatId(seatId: string): SeatPosition | null {
  const match = SEAT_ID_PATTERN.exec(seatId);
  if (!match?.[1] || !match[2]) return null;
  return { row: Number(match[1]), column: Number(match[2]) };
}

export function isSeatInLayout(seatId: string, layout: SeatLayout): boolean {
  const position = parseSeatId(seatId);
  if (!position) return false;
  return position.row < layout.rows && position.column < layout.columns;
}

/** All seat ids of a layout, row-major */
export function enumerateSeatIds(layout: SeatLayout): string[] {
  const ids: string[] = [];
  for (let row = 0; row < layout.rows; row++) {
    for (let column = 0; column < layout.columns; column++) {
      ids.push(formatSeatId(row, column));
    }
  }
  return ids;
}
