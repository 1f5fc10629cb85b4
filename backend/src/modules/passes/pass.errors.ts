/**
 * backend/src/modules/passes/pass.errors.ts
 *
 * WHY:
 * - Passes module owns its error semantics.
 * - `details.reason` is the machine-readable cause clients branch on.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never put a verification code into details or meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import type { PassStatus } from './pass.types';

export const PassErrors = {
  passNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Pass not found.', meta);
  },

  codeNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('No active pass matches this code.', meta);
  },

  studentNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Student not found in your school.', meta);
  },

  unknownLocation(locationId: string) {
    return AppError.validationError('Unknown location.', undefined, {
      reason: 'UNKNOWN_LOCATION',
      locationId,
    });
  },

  invalidWindow(message: string) {
    return AppError.validationError(message, undefined, { reason: 'INVALID_WINDOW' });
  },

  invalidFlags(message: string) {
    return AppError.validationError(message, undefined, { reason: 'INVALID_FLAGS' });
  },

  openPassExists(existing: { id: string; status: PassStatus }) {
    return AppError.conflict('Student already has an open pass.', undefined, {
      reason: 'OPEN_PASS_EXISTS',
      passId: existing.id,
      status: existing.status,
    });
  },

  atCapacity(input: { activeCount: number; limit: number }) {
    return AppError.conflict('Too many students are out right now. Try again shortly.', undefined, {
      reason: 'AT_CAPACITY',
      activeCount: input.activeCount,
      limit: input.limit,
    });
  },

  invalidTransition(input: { passId: string; from: PassStatus; to: PassStatus }) {
    return AppError.invalidState(`Pass cannot move from ${input.from} to ${input.to}.`, undefined, {
      reason: 'INVALID_TRANSITION',
      passId: input.passId,
      from: input.from,
      to: input.to,
    });
  },

  activationPremature(input: { passId: string; opensAt: Date }) {
    return AppError.invalidState('This pass cannot be used yet.', undefined, {
      reason: 'ACTIVATION_PREMATURE',
      passId: input.passId,
      opensAt: input.opensAt.toISOString(),
    });
  },

  passExpired(input: { passId: string; expiredAt: Date | null }) {
    return AppError.invalidState('This pass has expired.', undefined, {
      reason: 'PASS_EXPIRED',
      passId: input.passId,
      expiredAt: input.expiredAt ? input.expiredAt.toISOString() : null,
    });
  },

  concurrentUpdate(meta?: AppErrorMeta) {
    return AppError.conflict('The pass was changed by someone else. Reload and retry.', meta);
  },

  codeGenerationExhausted(meta?: AppErrorMeta) {
    return AppError.internal('Could not allocate a verification code.', meta);
  },
} as const;
