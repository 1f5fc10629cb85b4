/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code (+ public .details) to the response.
 * - RateLimitError → 429 response.
 * - Zod errors → 400 (safety net if a controller misses safeParse).
 * - Fastify client errors (malformed JSON body, etc.) → 400.
 * - Unexpected errors → 500 with generic message.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Always log through withRequestContext(req).
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { AppError, type AppErrorDetails } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
    details?: AppErrorDetails;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'sessionId',
  'cookie',
  'secret',
  'code',
  'verificationCode',
]);

function redactMeta(meta: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!meta) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string, details?: AppErrorDetails): ErrorResponseBody {
  return details ? { error: { code, message, details } } : { error: { code, message } };
}

function clientErrorStatus(err: Error): number | null {
  if (!('statusCode' in err) || typeof err.statusCode !== 'number') return null;
  return err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message, err.details));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return reply
        .status(429)
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Validation that escaped a controller
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });
      return reply
        .status(400)
        .send(buildResponse('VALIDATION_ERROR', 'Invalid request', { issues: err.issues }));
    }

    // 4) Fastify client errors (bad JSON, wrong content type, body too large)
    const status = clientErrorStatus(err);
    if (status !== null) {
      log.warn('client_error', { flow: 'http.error', status, message: err.message });
      return reply.status(status).send(buildResponse('VALIDATION_ERROR', err.message));
    }

    // 5) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
