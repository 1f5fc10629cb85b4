import { describe, it, expect } from 'vitest';
import {
  AUTO_APPROVAL_NOTE,
  activate,
  approve,
  buildNewPass,
  complete,
  deny,
  expire,
  initialStatus,
  revoke,
} from '../../../src/modules/passes/lifecycle/pass-state-machine';
import { addMinutes } from '../../../src/shared/time/clock';
import { catchAppError } from '../../helpers/build-test-app';
import { T0 } from '../../helpers/manual-clock';
import { makePass } from '../../helpers/pass-factory';

const window = {
  requestedStartTime: T0,
  requestedEndTime: addMinutes(T0, 20),
  allottedMinutes: 20,
};

function newPass(origin: 'self_request' | 'staff_issue', kind: 'pre_approved' | 'approval_required') {
  return buildNewPass({
    schoolId: 'school-a',
    studentId: 'stu-1',
    locationId: 'loc-1',
    issuedById: origin === 'staff_issue' ? 'tch-1' : 'stu-1',
    origin,
    locationKind: kind,
    window,
    isSummons: false,
    isEarlyRelease: false,
    studentReason: 'Headache',
    staffNotes: origin === 'staff_issue' ? 'Sent by Ms. Smith' : null,
    now: T0,
  });
}

describe('initial status', () => {
  it('auto-approves student requests to pre-approved locations only', () => {
    expect(initialStatus('self_request', 'pre_approved')).toBe('approved');
    expect(initialStatus('self_request', 'approval_required')).toBe('pending');
    expect(initialStatus('staff_issue', 'approval_required')).toBe('approved');
  });

  it('stamps the auto-approval note and decision time', () => {
    const pass = newPass('self_request', 'pre_approved');
    expect(pass.status).toBe('approved');
    expect(pass.approverId).toBeNull();
    expect(pass.approvalNotes).toBe(AUTO_APPROVAL_NOTE);
    expect(pass.decidedAt).toEqual(T0);
  });

  it('leaves a pending request undecided', () => {
    const pass = newPass('self_request', 'approval_required');
    expect(pass.status).toBe('pending');
    expect(pass.decidedAt).toBeNull();
    expect(pass.approvalNotes).toBeNull();
  });

  it('makes the issuer the approver of a staff-issued pass', () => {
    const pass = newPass('staff_issue', 'approval_required');
    expect(pass.status).toBe('approved');
    expect(pass.approverId).toBe('tch-1');
    expect(pass.approvalNotes).toBe('Sent by Ms. Smith');
  });

  it('starts every pass without code, start, end or duration', () => {
    const pass = newPass('self_request', 'pre_approved');
    expect(pass.verificationCode).toBeNull();
    expect(pass.actualStartTime).toBeNull();
    expect(pass.actualEndTime).toBeNull();
    expect(pass.durationMinutes).toBeNull();
  });
});

describe('transitions', () => {
  const later = addMinutes(T0, 3);

  it('approve and deny record the decider', () => {
    const pending = makePass({ status: 'pending', decidedAt: null });

    expect(approve(pending, { approverId: 'tch-1', notes: 'ok', now: later }).patch).toEqual({
      status: 'approved',
      approverId: 'tch-1',
      approvalNotes: 'ok',
      decidedAt: later,
      updatedAt: later,
    });
    expect(deny(pending, { approverId: 'tch-1', notes: null, now: later }).to).toBe('denied');
  });

  it('activate sets the start and the code', () => {
    const t = activate(makePass(), { verificationCode: 'QR-ABCDEFGH', now: later });
    expect(t).toEqual({
      passId: 'pass-1',
      from: 'approved',
      to: 'active',
      patch: {
        status: 'active',
        actualStartTime: later,
        verificationCode: 'QR-ABCDEFGH',
        updatedAt: later,
      },
    });
  });

  it('complete computes the duration and clears the code', () => {
    const active = makePass({ status: 'active', actualStartTime: T0, verificationCode: 'QR-ABCDEFGH' });
    const end = addMinutes(T0, 15);

    expect(complete(active, { now: end }).patch).toEqual({
      status: 'completed',
      actualEndTime: end,
      durationMinutes: 15,
      verificationCode: null,
      updatedAt: end,
    });
  });

  it('expire clears the code and leaves actualEndTime untouched', () => {
    const active = makePass({ status: 'active', actualStartTime: T0, verificationCode: 'QR-ABCDEFGH' });
    const patch = expire(active, { now: later }).patch;

    expect(patch).toEqual({
      status: 'expired',
      verificationCode: null,
      expiredAt: later,
      updatedAt: later,
    });
    expect('actualEndTime' in patch).toBe(false);
  });

  it('revoke records the administrator note', () => {
    const t = revoke(makePass({ status: 'pending' }), { notes: 'Fire drill', now: later });
    expect(t.to).toBe('expired');
    expect(t.patch.adminNotes).toBe('Fire drill');
  });

  it('refuses to activate a denied pass', () => {
    const err = catchAppError(() =>
      activate(makePass({ status: 'denied' }), { verificationCode: 'QR-ABCDEFGH', now: later }),
    );
    expect(err.code).toBe('INVALID_STATE');
    expect(err.details?.reason).toBe('INVALID_TRANSITION');
  });

  it('refuses to revoke a completed pass', () => {
    const err = catchAppError(() => revoke(makePass({ status: 'completed' }), { notes: 'x', now: later }));
    expect(err.code).toBe('INVALID_STATE');
  });
});
