/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests to run without Redis.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - const cache = new InMemCache(() => clock.now().getTime())  // expiry follows a test clock
 */

import type { Cache, CacheSetOptions } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();

  constructor(private readonly nowMs: () => number = Date.now) {}

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.nowMs()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    const expiresAtMs = opts?.ttlSeconds ? this.nowMs() + opts.ttlSeconds * 1000 : null;
    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    return Promise.resolve();
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    // Matches RedisCache: the window starts at the first hit and is not extended.
    const expiresAtMs =
      entry?.expiresAtMs ?? (opts?.ttlSeconds ? this.nowMs() + opts.ttlSeconds * 1000 : null);

    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }
}
