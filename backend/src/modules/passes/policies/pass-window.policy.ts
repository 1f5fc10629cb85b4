/**
 * backend/src/modules/passes/policies/pass-window.policy.ts
 *
 * WHY:
 * - Every time rule a pass lives by: when it may be activated, when it must
 *   be back, and when it expires.
 *
 * RULES:
 * - Pure functions only. `now` is always passed in.
 * - Boundaries are inclusive: a pass activated exactly at the window end still activates.
 *
 * DEADLINES:
 * - pending/approved: requestedStartTime + school.activationWindowMinutes
 * - active:           actualStartTime + allottedMinutes + school.overdueGraceMinutes
 */

import { addMinutes } from '../../../shared/time/clock';
import { MAX_PASS_MINUTES, type School } from '../../schools';
import type { Pass } from '../pass.types';
import { PassErrors } from '../pass.errors';
import { computeDurationMinutes } from '../helpers/duration-calculator';

export const START_TIME_PAST_TOLERANCE_MINUTES = 5;
export const START_TIME_MAX_AHEAD_MINUTES = 24 * 60;

type WindowSettings = Pick<School, 'activationWindowMinutes' | 'overdueGraceMinutes'>;

export type ResolvedWindow = Readonly<{
  requestedStartTime: Date;
  requestedEndTime: Date;
  allottedMinutes: number;
}>;

export type ActivationWindowState = 'premature' | 'open' | 'elapsed';

/**
 * Start defaults to now. An explicit end sets the allotted minutes;
 * otherwise the end is start + allottedMinutes.
 */
export function resolveRequestedWindow(input: {
  now: Date;
  allottedMinutes: number;
  startTime?: Date;
  endTime?: Date;
}): ResolvedWindow {
  const start = input.startTime ?? input.now;

  if (start < addMinutes(input.now, -START_TIME_PAST_TOLERANCE_MINUTES)) {
    throw PassErrors.invalidWindow('Start time is in the past.');
  }
  if (start > addMinutes(input.now, START_TIME_MAX_AHEAD_MINUTES)) {
    throw PassErrors.invalidWindow('Start time is more than a day ahead.');
  }

  if (!input.endTime) {
    return {
      requestedStartTime: start,
      requestedEndTime: addMinutes(start, input.allottedMinutes),
      allottedMinutes: input.allottedMinutes,
    };
  }

  if (input.endTime <= start) {
    throw PassErrors.invalidWindow('End time must be after start time.');
  }

  const minutes = Math.max(1, computeDurationMinutes(start, input.endTime));
  if (minutes > MAX_PASS_MINUTES) {
    throw PassErrors.invalidWindow(`A pass cannot last more than ${MAX_PASS_MINUTES} minutes.`);
  }

  return { requestedStartTime: start, requestedEndTime: input.endTime, allottedMinutes: minutes };
}

export function activationDeadline(pass: Pass, settings: WindowSettings): Date {
  return addMinutes(pass.requestedStartTime, settings.activationWindowMinutes);
}

/** When the student is expected back. Null unless the pass has started. */
export function returnBy(pass: Pass): Date | null {
  return pass.actualStartTime ? addMinutes(pass.actualStartTime, pass.allottedMinutes) : null;
}

export function expiryDeadline(pass: Pass, settings: WindowSettings): Date | null {
  switch (pass.status) {
    case 'pending':
    case 'approved':
      return activationDeadline(pass, settings);
    case 'active': {
      const due = returnBy(pass);
      return due ? addMinutes(due, settings.overdueGraceMinutes) : null;
    }
    default:
      return null;
  }
}

export function isExpiryDue(pass: Pass, settings: WindowSettings, now: Date): boolean {
  const deadline = expiryDeadline(pass, settings);
  return deadline !== null && now > deadline;
}

export function activationWindowState(
  pass: Pass,
  settings: WindowSettings,
  now: Date,
): ActivationWindowState {
  if (now < pass.requestedStartTime) return 'premature';
  if (now > activationDeadline(pass, settings)) return 'elapsed';
  return 'open';
}
