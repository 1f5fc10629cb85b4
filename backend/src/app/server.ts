/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1. requestContext (requestId + school key from the subdomain)
 * 2. authContext stub
 * 3. session middleware (fills authContext from the cookie)
 * 4. request log line
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { withRequestContext } from '../shared/logger/with-context';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerSessionMiddleware } from '../shared/session/session.middleware';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    trustProxy: opts.config.nodeEnv === 'production',
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerSessionMiddleware(app, opts.deps.sessionStore);
  registerErrorHandler(app);

  app.addHook('onRequest', async (req) => {
    withRequestContext(req).info('request', {
      method: req.method,
      url: req.url,
    });
  });

  return app;
}
