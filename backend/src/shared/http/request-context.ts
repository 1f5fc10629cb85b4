/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - Each school is served on its own subdomain; we need to know which one a request targets.
 * - We also want a stable requestId for logs, auditing and tracing.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - schoolKey can be null (localhost root, apex domain, missing/invalid Host header).
 * - schoolKey is a routing hint only. Authority over a school comes from the session.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  host: string | null;
  schoolKey: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim();
  if (!trimmed) return null;

  // strip port if present (e.g., "edison.localhost:3000")
  return trimmed.split(':')[0]?.toLowerCase() ?? null;
}

/**
 * Extracts the school key from the host.
 *
 * - edison.localhost → edison
 * - edison.hallpass.example.org → edison
 * - localhost, apex domains, invalid hosts → null
 */
export function extractSchoolKey(host: string | null): string | null {
  if (!host) return null;

  if (host === 'localhost') return null;
  if (host.endsWith('.localhost')) {
    const [school] = host.split('.');
    return school && school !== 'localhost' ? school : null;
  }

  const parts = host.split('.');
  if (parts.length >= 3) {
    const candidate = parts[0];
    return candidate ? candidate : null;
  }

  return null;
}

export function registerRequestContext(app: FastifyInstance) {
  // Real value is assigned on each request in the onRequest hook.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    const host = parseHost(req.headers.host);

    req.requestContext = {
      requestId: randomUUID(),
      host,
      schoolKey: extractSchoolKey(host),
    };

    done();
  });
}
