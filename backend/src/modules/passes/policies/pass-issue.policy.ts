/**
 * backend/src/modules/passes/policies/pass-issue.policy.ts
 *
 * WHY:
 * - Summons and early-release flags must agree with the destination.
 *
 * RULES:
 * - Pure functions only.
 */

import type { LocationKind } from '../../schools';
import { PassErrors } from '../pass.errors';

export type PassFlags = Readonly<{ isSummons: boolean; isEarlyRelease: boolean }>;

export function assertFlagsMatchLocation(kind: LocationKind, flags: PassFlags): void {
  if (flags.isSummons && flags.isEarlyRelease) {
    throw PassErrors.invalidFlags('A pass cannot be both a summons and an early release.');
  }
  if (kind === 'summons_only' && !flags.isSummons) {
    throw PassErrors.invalidFlags('This location requires a summons pass.');
  }
  if (kind === 'early_release_only' && !flags.isEarlyRelease) {
    throw PassErrors.invalidFlags('This location requires an early release pass.');
  }
  if (flags.isEarlyRelease && kind !== 'early_release_only') {
    throw PassErrors.invalidFlags('Early release passes must go to an early release location.');
  }
}

export function assertNoStaffFlags(flags: PassFlags): void {
  if (flags.isSummons || flags.isEarlyRelease) {
    throw PassErrors.invalidFlags('Only staff can issue summons or early release passes.');
  }
}
