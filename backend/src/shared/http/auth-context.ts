/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication happens at the school's identity provider; we only read the
 *   resulting session. This is the per-request view of that session.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an all-null stub on every request.
 * 2. Session middleware overwrites it when a valid session cookie is present.
 * 3. Controllers call requireActor(req) to turn it into an Actor.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Role } from '../../modules/access';

export type AuthContext = {
  userId: string | null;
  schoolId: string | null;
  role: Role | null;
  sessionId: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = {
      userId: null,
      schoolId: null,
      role: null,
      sessionId: null,
    };

    done();
  });
}
