/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require session" logic.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Only answers "is there a caller?". What the caller may do is the
 *   AuthorizationGuard's job, so role checks do not live here.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { Actor } from '../../modules/access';

export type RequestMeta = Readonly<{
  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
}>;

/**
 * Controller guard: no complete session → 401 "Authentication required".
 */
export function requireActor(req: FastifyRequest): Actor {
  const ctx = req.authContext;
  if (!ctx || !ctx.sessionId || !ctx.userId || !ctx.schoolId || !ctx.role) {
    throw AppError.unauthorized('Authentication required');
  }

  return { userId: ctx.userId, schoolId: ctx.schoolId, role: ctx.role };
}

export function requestMeta(req: FastifyRequest): RequestMeta {
  const userAgent = req.headers['user-agent'];
  return {
    requestId: req.requestContext?.requestId ?? null,
    ip: req.ip ?? null,
    userAgent: typeof userAgent === 'string' ? userAgent : null,
  };
}
