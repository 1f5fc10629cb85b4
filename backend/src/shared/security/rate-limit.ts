/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Caps how many passes a student can request per window, so a stuck client
 *   (or a bored student) can't flood the teacher's approval queue.
 * - Uses Redis in prod, but depends only on Cache.
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: 'rl' })
 * - await limiter.hitOrThrow({ key: 'pass-request:student:<id>', limit: 10, windowSeconds: 3600 })
 *
 * ATOMICITY:
 * - INCR-then-check. INCR is atomic in Redis, so two concurrent hits can't both slip under the limit.
 *
 * DISABLING:
 * - Pass `disabled: true` to skip all checks. That decision belongs to the composition root.
 */

import type { Cache } from '../cache/cache';

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
  }
}

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string; disabled?: boolean },
  ) {}

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  /**
   * Increments the counter for `key`.
   * Throws RateLimitError if the counter exceeds `limit`.
   */
  async hitOrThrow(input: { key: string; limit: number; windowSeconds: number }): Promise<void> {
    if (this.opts?.disabled) return;

    const fullKey = this.buildKey(input.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: input.windowSeconds });

    if (current > input.limit) {
      throw new RateLimitError(fullKey, input.limit, input.windowSeconds);
    }
  }
}
