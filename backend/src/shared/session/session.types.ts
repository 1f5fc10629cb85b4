/**
 * backend/src/shared/session/session.types.ts
 *
 * WHY:
 * - Sessions are issued by the school's sign-in service and stored in Redis.
 *   This backend only reads them, so the payload is validated on every read.
 *
 * RULES:
 * - Session data must be JSON-serializable (stored as a JSON string).
 * - Never store credentials in session data.
 */

import { z } from 'zod';
import { ROLES } from '../../modules/access';

export const sessionDataSchema = z.object({
  userId: z.string().uuid(),
  schoolId: z.string().uuid(),
  /** Subdomain key, used by the middleware for the school-safety check. */
  schoolKey: z.string().min(1),
  role: z.enum(ROLES),
  createdAt: z.string().datetime(),
});

export type SessionData = z.infer<typeof sessionDataSchema>;

export const SESSION_COOKIE_NAME = 'hp_sid';

/** Full key: `session:{sessionId}`. */
export const SESSION_KEY_PREFIX = 'session';
