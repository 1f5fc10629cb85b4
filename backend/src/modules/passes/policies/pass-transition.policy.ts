/**
 * backend/src/modules/passes/policies/pass-transition.policy.ts
 *
 * WHY:
 * - The transition graph is the whole lifecycle contract. Everything that
 *   changes a pass status goes through assertTransition().
 *
 * RULES:
 * - Pure functions only.
 */

import type { Pass, PassStatus } from '../pass.types';
import { PassErrors } from '../pass.errors';

export const PASS_TRANSITIONS: Readonly<Record<PassStatus, readonly PassStatus[]>> = {
  pending: ['approved', 'denied', 'expired'],
  approved: ['active', 'expired'],
  active: ['completed', 'expired'],
  completed: [],
  denied: [],
  expired: [],
};

export function canTransition(from: PassStatus, to: PassStatus): boolean {
  return PASS_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: PassStatus): boolean {
  return PASS_TRANSITIONS[status].length === 0;
}

export function assertTransition(pass: Pass, to: PassStatus): void {
  if (!canTransition(pass.status, to)) {
    throw PassErrors.invalidTransition({ passId: pass.id, from: pass.status, to });
  }
}
