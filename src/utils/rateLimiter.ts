import type { Redis } from "ioredis";

export class RateLimiter {
  private readonly PREFIX = "ratelimit:";

  constructor(private readonly redis: Redis) {}

  /**
   * Fixed-window counter: INCR, and start the window on the first hit.
   * @param key Identifier (e.g. "roster:userId:chatId")
   * @param limit Max requests per window
   * @param windowSeconds Window length in seconds
   */
  async isAllowed(
    key: string,
    limit: number,
    windowSeconds: number,
  ): Promise<boolean> {
    const redisKey = `${this.PREFIX}${key}`;

    const multi = this.redis.multi();
    multi.incr(redisKey);
    multi.expire(redisKey, windowSeconds, "NX");

    const results = await multi.exec();
    if (!results || !results[0]) return false;

    // results[0] is [error, result]
    const [error, count] = results[0];
    if (error || typeof count !== "number") return false;
    return count <= limit;
  }
}
