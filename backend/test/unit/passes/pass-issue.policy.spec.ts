import { describe, it, expect } from 'vitest';
import {
  assertFlagsMatchLocation,
  assertNoStaffFlags,
} from '../../../src/modules/passes/policies/pass-issue.policy';
import { catchAppError } from '../../helpers/build-test-app';

const none = { isSummons: false, isEarlyRelease: false };
const summons = { isSummons: true, isEarlyRelease: false };
const earlyRelease = { isSummons: false, isEarlyRelease: true };

describe('pass flags', () => {
  it('requires the summons flag for summons-only locations', () => {
    expect(() => assertFlagsMatchLocation('summons_only', summons)).not.toThrow();
    expect(catchAppError(() => assertFlagsMatchLocation('summons_only', none)).message).toBe(
      'This location requires a summons pass.',
    );
  });

  it('ties early release to early-release locations in both directions', () => {
    expect(() => assertFlagsMatchLocation('early_release_only', earlyRelease)).not.toThrow();
    expect(catchAppError(() => assertFlagsMatchLocation('early_release_only', none)).message).toBe(
      'This location requires an early release pass.',
    );
    expect(catchAppError(() => assertFlagsMatchLocation('pre_approved', earlyRelease)).message).toBe(
      'Early release passes must go to an early release location.',
    );
  });

  it('allows a summons to an ordinary location', () => {
    expect(() => assertFlagsMatchLocation('approval_required', summons)).not.toThrow();
  });

  it('rejects both flags at once', () => {
    const err = catchAppError(() =>
      assertFlagsMatchLocation('summons_only', { isSummons: true, isEarlyRelease: true }),
    );
    expect(err.details).toEqual({ reason: 'INVALID_FLAGS' });
  });

  it('never lets a student set staff flags', () => {
    expect(() => assertNoStaffFlags(none)).not.toThrow();
    expect(catchAppError(() => assertNoStaffFlags(summons)).code).toBe('VALIDATION_ERROR');
  });
});
