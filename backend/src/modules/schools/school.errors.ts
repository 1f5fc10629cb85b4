/**
 * backend/src/modules/schools/school.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const SchoolErrors = {
  schoolNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('School not found.', meta);
  },

  limitBelowActive(details: { requestedLimit: number; activeCount: number }) {
    return AppError.conflict(
      'More students are out right now than the new limit allows.',
      undefined,
      { reason: 'LIMIT_BELOW_ACTIVE', ...details },
    );
  },

  locationNameTaken(name: string) {
    return AppError.conflict('A location with this name already exists.', undefined, {
      reason: 'LOCATION_NAME_TAKEN',
      name,
    });
  },
} as const;
