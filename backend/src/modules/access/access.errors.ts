/**
 * backend/src/modules/access/access.errors.ts
 *
 * WHY:
 * - A denial is an answer the client can act on: the response carries the
 *   denial code and where to send the user instead.
 */

import { AppError } from '../../shared/http/errors';
import type { Actor, Denial } from './access.types';

export const AccessErrors = {
  denied(actor: Actor, denial: Denial) {
    return AppError.forbidden(
      denial.message,
      { userId: actor.userId, schoolId: actor.schoolId },
      {
        reason: denial.code,
        role: denial.role,
        requiredCapability: denial.requiredCapability,
        suggestedSurface: denial.suggestedSurface,
      },
    );
  },
} as const;
