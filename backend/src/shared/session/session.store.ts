/**
 * backend/src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side sessions via the Cache abstraction (Redis in prod, InMemCache in tests).
 * - Sessions are revocable instantly with destroy(); TTL is enforced by the cache.
 *
 * RULES:
 * - No HTTP concerns here (cookie handling lives in middleware).
 * - A payload that fails validation is treated as missing and removed.
 */

import { randomUUID } from 'node:crypto';
import type { Cache } from '../cache/cache';
import { SESSION_KEY_PREFIX, sessionDataSchema, type SessionData } from './session.types';

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly ttlSeconds: number,
  ) {}

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}:${sessionId}`;
  }

  /** Returns the new session id. Used by the dev seed and tests; sign-in lives elsewhere. */
  async create(data: SessionData): Promise<string> {
    const sessionId = randomUUID();
    await this.cache.set(this.key(sessionId), JSON.stringify(data), {
      ttlSeconds: this.ttlSeconds,
    });
    return sessionId;
  }

  async get(sessionId: string): Promise<SessionData | null> {
    const raw = await this.cache.get(this.key(sessionId));
    if (!raw) return null;

    const parsed = sessionDataSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      await this.destroy(sessionId);
      return null;
    }
    return parsed.data;
  }

  async destroy(sessionId: string): Promise<void> {
    await this.cache.del(this.key(sessionId));
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
