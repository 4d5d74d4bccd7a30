import { describe, it, expect } from "vitest";
import {
  DEFAULT_SEAT_LAYOUT,
  enumerateSeatIds,
  formatSeatId,
  isSeatInLayout,
  parseSeatId,
  seatIdSchema,
} from "@src/protocol/seats.js";

describe("seat identifiers", () => {
  it("formats and parses row/column pairs", () => {
    expect(formatSeatId(2, 5)).toBe("seat-2-5");
    expect(parseSeatId("seat-2-5")).toEqual({ row: 2, column: 5 });
  });

  it("rejects ids that do not follow the pattern", () => {
    expect(parseSeatId("seat-2")).toBeNull();
    expect(parseSeatId("desk-1-1")).toBeNull();
    expect(parseSeatId("seat-1-1 ")).toBeNull();
    expect(seatIdSchema.safeParse("seat--1-1").success).toBe(false);
  });

  it("bounds seats by the layout", () => {
    expect(isSeatInLayout("seat-0-0", DEFAULT_SEAT_LAYOUT)).toBe(true);
    expect(isSeatInLayout("seat-4-5", DEFAULT_SEAT_LAYOUT)).toBe(true);
    expect(isSeatInLayout("seat-5-0", DEFAULT_SEAT_LAYOUT)).toBe(false);
    expect(isSeatInLayout("seat-0-6", DEFAULT_SEAT_LAYOUT)).toBe(false);
    expect(isSeatInLayout("blackboard", DEFAULT_SEAT_LAYOUT)).toBe(false);
  });

  it("enumerates a layout row by row", () => {
    expect(enumerateSeatIds({ rows: 2, columns: 2 })).toEqual([
      "seat-0-0",
      "seat-0-1",
      "seat-1-0",
      "seat-1-1",
    ]);
    expect(enumerateSeatIds(DEFAULT_SEAT_LAYOUT)).toHaveLength(30);
  });
});
