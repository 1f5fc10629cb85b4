/**
 * backend/src/modules/passes/lifecycle/pass-state-machine.ts
 *
 * WHY:
 * - Turns "what happened" into "what the pass looks like now", without I/O.
 *   Flows persist the returned patch with a compare-and-set on `from`, so two
 *   racing writers can't both apply a transition.
 *
 * RULES:
 * - Pure functions only. Every transition asserts legality first.
 * - Every transition stamps updatedAt with the caller's `now`.
 */

import type { LocationKind } from '../../schools';
import type { NewPass, Pass, PassOrigin, PassPatch, PassStatus } from '../pass.types';
import { PassErrors } from '../pass.errors';
import { assertTransition } from '../policies/pass-transition.policy';
import type { ResolvedWindow } from '../policies/pass-window.policy';
import { computeDurationMinutes } from '../helpers/duration-calculator';

export type PassTransition = Readonly<{
  passId: string;
  from: PassStatus;
  to: PassStatus;
  patch: PassPatch;
}>;

export const AUTO_APPROVAL_NOTE = 'Auto-approved based on location settings';

/**
 * Staff-issued passes start approved (the issuer is the approver).
 * Student requests start approved only for pre-approved locations.
 */
export function initialStatus(origin: PassOrigin, kind: LocationKind): 'pending' | 'approved' {
  if (origin === 'staff_issue') return 'approved';
  return kind === 'pre_approved' ? 'approved' : 'pending';
}

export function buildNewPass(input: {
  schoolId: string;
  studentId: string;
  locationId: string;
  issuedById: string;
  origin: PassOrigin;
  locationKind: LocationKind;
  window: ResolvedWindow;
  isSummons: boolean;
  isEarlyRelease: boolean;
  studentReason: string | null;
  staffNotes: string | null;
  now: Date;
}): NewPass {
  const status = initialStatus(input.origin, input.locationKind);
  const staffIssued = input.origin === 'staff_issue';

  return {
    schoolId: input.schoolId,
    studentId: input.studentId,
    locationId: input.locationId,
    issuedById: input.issuedById,
    approverId: staffIssued ? input.issuedById : null,
    status,
    requestedStartTime: input.window.requestedStartTime,
    requestedEndTime: input.window.requestedEndTime,
    allottedMinutes: input.window.allottedMinutes,
    actualStartTime: null,
    actualEndTime: null,
    durationMinutes: null,
    verificationCode: null,
    isSummons: input.isSummons,
    isEarlyRelease: input.isEarlyRelease,
    studentReason: input.studentReason,
    approvalNotes: staffIssued
      ? input.staffNotes
      : status === 'approved'
        ? AUTO_APPROVAL_NOTE
        : null,
    adminNotes: null,
    decidedAt: status === 'approved' ? input.now : null,
    expiredAt: null,
    createdAt: input.now,
    updatedAt: input.now,
  };
}

function transition(pass: Pass, to: PassStatus, patch: Omit<PassPatch, 'status'>): PassTransition {
  assertTransition(pass, to);
  return { passId: pass.id, from: pass.status, to, patch: { ...patch, status: to } };
}

export function approve(pass: Pass, input: { approverId: string; notes: string | null; now: Date }) {
  return transition(pass, 'approved', {
    approverId: input.approverId,
    approvalNotes: input.notes,
    decidedAt: input.now,
    updatedAt: input.now,
  });
}

export function deny(pass: Pass, input: { approverId: string; notes: string | null; now: Date }) {
  return transition(pass, 'denied', {
    approverId: input.approverId,
    approvalNotes: input.notes,
    decidedAt: input.now,
    updatedAt: input.now,
  });
}

export function activate(pass: Pass, input: { verificationCode: string; now: Date }) {
  return transition(pass, 'active', {
    actualStartTime: input.now,
    verificationCode: input.verificationCode,
    updatedAt: input.now,
  });
}

export function complete(pass: Pass, input: { now: Date }) {
  if (!pass.actualStartTime) {
    throw PassErrors.invalidTransition({ passId: pass.id, from: pass.status, to: 'completed' });
  }

  return transition(pass, 'completed', {
    actualEndTime: input.now,
    durationMinutes: computeDurationMinutes(pass.actualStartTime, input.now),
    verificationCode: null,
    updatedAt: input.now,
  });
}

/** Deadline passed (lazy read or sweep). The student never checked back in, so actualEndTime stays null. */
export function expire(pass: Pass, input: { now: Date }) {
  return transition(pass, 'expired', {
    verificationCode: null,
    expiredAt: input.now,
    updatedAt: input.now,
  });
}

/** Administrator override: ends any open pass immediately. */
export function revoke(pass: Pass, input: { notes: string; now: Date }) {
  return transition(pass, 'expired', {
    verificationCode: null,
    adminNotes: input.notes,
    expiredAt: input.now,
    updatedAt: input.now,
  });
}
