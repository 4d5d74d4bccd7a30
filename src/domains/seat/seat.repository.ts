/**
 * Seat Repository - Redis-backed seat occupancy
 * Handles all seat state in Redis so that every relay instance sees the same room
 *
 * Two hashes per room are kept in step by Lua scripts:
 *   room:<id>:seats       seat id → user id
 *   room:<id>:user_seats  user id → seat id
 */
import type { Redis } from "ioredis";
import { z } from "zod";
import type { SeatClaimResult, SeatReleaseResult, SeatStore } from "./seat.types.js";
import { Errors } from "../../shared/errors.js";
import { logger } from "../../infrastructure/logger.js";

// Redis key patterns
const SEATS_KEY = (roomId: string) => `room:${roomId}:seats`;
const USER_SEATS_KEY = (roomId: string) => `room:${roomId}:user_seats`;

// ─────────────────────────────────────────────────────────────────
// Lua Scripts
// ─────────────────────────────────────────────────────────────────

const CLAIM_SEAT_SCRIPT = `
  local seatsKey = KEYS[1]
  local userSeatsKey = KEYS[2]
  local seatId = ARGV[1]
  local userId = ARGV[2]

  local occupant = redis.call('HGET', seatsKey, seatId)
  if occupant then
    if occupant == userId then
      return cjson.encode({success = true, seatId = seatId, previousSeatId = false})
    end
    return cjson.encode({success = false, error = "SEAT_TAKEN", occupantId = occupant})
  end

  -- One seat per user: vacate the previous one in the same step
  local previous = redis.call('HGET', userSeatsKey, userId)
  if previous then
    redis.call('HDEL', seatsKey, previous)
  end

  redis.call('HSET', seatsKey, seatId, userId)
  redis.call('HSET', userSeatsKey, userId, seatId)

  return cjson.encode({success = true, seatId = seatId, previousSeatId = previous or false})
`;

const RELEASE_SEAT_SCRIPT = `
  local seatsKey = KEYS[1]
  local userSeatsKey = KEYS[2]
  local userId = ARGV[1]
  local expectedSeatId = ARGV[2]

  local current = redis.call('HGET', userSeatsKey, userId)
  if not current then
    return cjson.encode({success = false, error = "NOT_SEATED"})
  end
  if expectedSeatId ~= '' and current ~= expectedSeatId then
    return cjson.encode({success = false, error = "NOT_SEATED"})
  end

  redis.call('HDEL', seatsKey, current)
  redis.call('HDEL', userSeatsKey, userId)

  return cjson.encode({success = true, seatId = current})
`;

// cjson encodes a missing value as `false`
const optionalString = z
  .union([z.string(), z.literal(false)])
  .optional()
  .transform((v) => (typeof v === "string" ? v : null));

const claimScriptResultSchema = z.discriminatedUnion("success", [
  z.object({ success: z.literal(true), seatId: z.string(), previousSeatId: optionalString }),
  z.object({ success: z.literal(false), error: z.string(), occupantId: optionalString }),
]);

const releaseScriptResultSchema = z.discriminatedUnion("success", [
  z.object({ success: z.literal(true), seatId: z.string() }),
  z.object({ success: z.literal(false), error: z.string() }),
]);

function parseScriptResult<T>(raw: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  if (typeof raw !== "string") {
    throw new Error(`Unexpected Lua reply: ${typeof raw}`);
  }
  return schema.parse(JSON.parse(raw));
}

export class SeatRepository implements SeatStore {
  constructor(private readonly redis: Redis) {}

  /**
   * Atomically take a seat (removes user from any existing seat first)
   */
  async claim(roomId: string, userId: string, seatId: string): Promise<SeatClaimResult> {
    try {
      const raw = await this.redis.eval(
        CLAIM_SEAT_SCRIPT,
        2,
        SEATS_KEY(roomId),
        USER_SEATS_KEY(roomId),
        seatId,
        userId,
      );
      const parsed = parseScriptResult(raw, claimScriptResultSchema);

      if (!parsed.success) {
        return {
          success: false,
          error: this.mapError(parsed.error),
          occupantId: parsed.occupantId,
        };
      }
      return parsed;
    } catch (err) {
      logger.error({ err, roomId, userId, seatId }, "Failed to claim seat");
      return { success: false, error: Errors.INTERNAL_ERROR, occupantId: null };
    }
  }

  /**
   * Leave current seat
   */
  async release(
    roomId: string,
    userId: string,
    expectedSeatId?: string,
  ): Promise<SeatReleaseResult> {
    try {
      const raw = await this.redis.eval(
        RELEASE_SEAT_SCRIPT,
        2,
        SEATS_KEY(roomId),
        USER_SEATS_KEY(roomId),
        userId,
        expectedSeatId ?? "",
      );
      const parsed = parseScriptResult(raw, releaseScriptResultSchema);

      if (!parsed.success) {
        return { success: false, error: this.mapError(parsed.error) };
      }
      return parsed;
    } catch (err) {
      logger.error({ err, roomId, userId }, "Failed to release seat");
      return { success: false, error: Errors.INTERNAL_ERROR };
    }
  }

  async getAssignments(roomId: string): Promise<Map<string, string>> {
    const raw = await this.redis.hgetall(USER_SEATS_KEY(roomId));
    return new Map(Object.entries(raw));
  }

  async clearRoom(roomId: string): Promise<void> {
    await this.redis.del(SEATS_KEY(roomId), USER_SEATS_KEY(roomId));
  }

  private mapError(code: string): string {
    switch (code) {
      case "SEAT_TAKEN":
        return Errors.SEAT_TAKEN;
      case "NOT_SEATED":
        return Errors.NOT_SEATED;
      default:
        return Errors.INTERNAL_ERROR;
    }
  }
}
