/**
 * Participant Repository - Redis-backed room membership
 *
 *   room:<id>:participants  user id → profile JSON
 *   room:<id>:connections   user id → open connection count
 */
import type { Redis } from "ioredis";
import { z } from "zod";
import { participantSchema } from "../../protocol/messages.js";
import { Errors } from "../../shared/errors.js";
import { logger } from "../../infrastructure/logger.js";
import type {
  AddConnectionResult,
  ParticipantProfile,
  ParticipantStore,
  RemoveConnectionResult,
} from "./participant.types.js";

const PARTICIPANTS_KEY = (roomId: string) => `room:${roomId}:participants`;
const CONNECTIONS_KEY = (roomId: string) => `room:${roomId}:connections`;

const ADD_CONNECTION_SCRIPT = `
  local participantsKey = KEYS[1]
  local connectionsKey = KEYS[2]
  local userId = ARGV[1]
  local profile = ARGV[2]
  local maxParticipants = tonumber(ARGV[3])

  if redis.call('HEXISTS', participantsKey, userId) == 0
    and redis.call('HLEN', participantsKey) >= maxParticipants then
    return cjson.encode({success = false, error = "ROOM_FULL"})
  end

  local connections = redis.call('HINCRBY', connectionsKey, userId, 1)
  redis.call('HSET', participantsKey, userId, profile)

  return cjson.encode({
    success = true,
    connections = connections,
    participantCount = redis.call('HLEN', participantsKey)
  })
`;

const REMOVE_CONNECTION_SCRIPT = `
  local participantsKey = KEYS[1]
  local connectionsKey = KEYS[2]
  local userId = ARGV[1]

  local connections = redis.call('HINCRBY', connectionsKey, userId, -1)
  local lastConnection = connections <= 0
  if lastConnection then
    redis.call('HDEL', connectionsKey, userId)
    redis.call('HDEL', participantsKey, userId)
  end

  return cjson.encode({
    lastConnection = lastConnection,
    participantCount = redis.call('HLEN', participantsKey)
  })
`;

const profileSchema = participantSchema.omit({ seat_id: true });

const addResultSchema = z.discriminatedUnion("success", [
  z.object({
    success: z.literal(true),
    connections: z.number().int(),
    participantCount: z.number().int(),
  }),
  z.object({ success: z.literal(false), error: z.string() }),
]);

const removeResultSchema = z.object({
  lastConnection: z.boolean(),
  participantCount: z.number().int(),
});

function parseReply(raw: unknown): unknown {
  if (typeof raw !== "string") {
    throw new Error(`Unexpected Lua reply: ${typeof raw}`);
  }
  return JSON.parse(raw);
}

export class ParticipantRepository implements ParticipantStore {
  constructor(private readonly redis: Redis) {}

  /**
   * Record one more connection for the user, creating the participant on
   * the first one. Refuses new participants once the room is full.
   */
  async addConnection(
    roomId: string,
    profile: ParticipantProfile,
    maxParticipants: number,
  ): Promise<AddConnectionResult> {
    try {
      const raw = await this.redis.eval(
        ADD_CONNECTION_SCRIPT,
        2,
        PARTICIPANTS_KEY(roomId),
        CONNECTIONS_KEY(roomId),
        profile.id,
        JSON.stringify(profile),
        maxParticipants.toString(),
      );
      const parsed = addResultSchema.parse(parseReply(raw));

      if (!parsed.success) {
        return {
          success: false,
          error: parsed.error === "ROOM_FULL" ? Errors.ROOM_FULL : Errors.INTERNAL_ERROR,
        };
      }
      return parsed;
    } catch (err) {
      logger.error({ err, roomId, userId: profile.id }, "Failed to add connection");
      return { success: false, error: Errors.INTERNAL_ERROR };
    }
  }

  /**
   * Throws on Redis failure: disconnect cleanup has no sender to answer
   */
  async removeConnection(roomId: string, userId: string): Promise<RemoveConnectionResult> {
    const raw = await this.redis.eval(
      REMOVE_CONNECTION_SCRIPT,
      2,
      PARTICIPANTS_KEY(roomId),
      CONNECTIONS_KEY(roomId),
      userId,
    );
    return removeResultSchema.parse(parseReply(raw));
  }

  /**
   * Participants ordered by id; corrupt entries are skipped
   */
  async list(roomId: string): Promise<ParticipantProfile[]> {
    const raw = await this.redis.hgetall(PARTICIPANTS_KEY(roomId));
    const profiles: ParticipantProfile[] = [];

    for (const [userId, json] of Object.entries(raw)) {
      let value: unknown;
      try {
        value = JSON.parse(json);
      } catch (err) {
        logger.warn({ err, roomId, userId }, "Unreadable participant entry");
        continue;
      }
      const parsed = profileSchema.safeParse(value);
      if (parsed.success) {
        profiles.push(parsed.data);
      } else {
        logger.warn({ roomId, userId }, "Invalid participant entry");
      }
    }

    return profiles.sort((a, b) => a.id.localeCompare(b.id));
  }

  async clearRoom(roomId: string): Promise<void> {
    await this.redis.del(PARTICIPANTS_KEY(roomId), CONNECTIONS_KEY(roomId));
  }
}
