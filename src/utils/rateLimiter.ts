import type { Redis } from "ioredis";

export interface MessageRateLimiter {
  isAllowed(key: string, limit: number, windowSeconds: number): Promise<boolean>;
}

export class RateLimiter implements MessageRateLimiter {
  private readonly PREFIX = "ratelimit:";

  constructor(private readonly redis: Redis) {}

  /**
   * Fixed window counter.
   * @param key Identifier (e.g. "msg:roomId:userId")
   * @param limit Max requests per window
   */
  async isAllowed(
    key: string,
    limit: number,
    windowSeconds: number,
  ): Promise<boolean> {
    const redisKey = `${this.PREFIX}${key}`;

    const multi = this.redis.multi();
    multi.incr(redisKey);
    multi.expire(redisKey, windowSeconds, "NX"); // Set expiry only if not set

    const results = await multi.exec();
    const incr = results?.[0];
    if (!incr) return false;

    // incr is [error, result]
    const [err, count] = incr;
    if (err || typeof count !== "number") return false;
    return count <= limit;
  }
}
