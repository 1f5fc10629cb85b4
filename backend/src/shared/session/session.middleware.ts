/**
 * backend/src/shared/session/session.middleware.ts
 *
 * WHY:
 * - Reads the session cookie on every request and fills req.authContext.
 * - Does NOT throw if there is no session; controllers decide via requireActor().
 * - School safety: a session issued for school A is ignored on school B's subdomain.
 *
 * RULES:
 * - Runs AFTER the requestContext and authContext hooks (needs both to exist).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { withRequestContext } from '../logger/with-context';
import type { SessionStore } from './session.store';
import { SESSION_COOKIE_NAME } from './session.types';

/** "key1=value1; key2=value2" → record. */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = value;
  }
  return cookies;
}

export function registerSessionMiddleware(app: FastifyInstance, sessionStore: SessionStore): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const sessionId = parseCookies(req.headers.cookie)[SESSION_COOKIE_NAME];
    if (!sessionId) return;

    const session = await sessionStore.get(sessionId);
    if (!session) return;

    const requestSchoolKey = req.requestContext?.schoolKey ?? null;
    if (requestSchoolKey && session.schoolKey !== requestSchoolKey) {
      withRequestContext(req).debug('session.school_mismatch', { sessionSchoolKey: session.schoolKey });
      return;
    }

    req.authContext = {
      userId: session.userId,
      schoolId: session.schoolId,
      role: session.role,
      sessionId,
    };
  });
}
