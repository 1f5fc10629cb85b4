import { describe, it, expect } from 'vitest';
import {
  activationWindowState,
  expiryDeadline,
  isExpiryDue,
  resolveRequestedWindow,
  returnBy,
} from '../../../src/modules/passes/policies/pass-window.policy';
import { addMinutes } from '../../../src/shared/time/clock';
import { catchAppError } from '../../helpers/build-test-app';
import { T0 } from '../../helpers/manual-clock';
import { makePass, makeSchool } from '../../helpers/pass-factory';

const school = makeSchool({ activationWindowMinutes: 15, overdueGraceMinutes: 5 });

describe('resolveRequestedWindow', () => {
  it('defaults to now + allotted minutes', () => {
    expect(resolveRequestedWindow({ now: T0, allottedMinutes: 20 })).toEqual({
      requestedStartTime: T0,
      requestedEndTime: addMinutes(T0, 20),
      allottedMinutes: 20,
    });
  });

  it('derives allotted minutes from an explicit end time', () => {
    const window = resolveRequestedWindow({
      now: T0,
      allottedMinutes: 10,
      startTime: addMinutes(T0, 30),
      endTime: addMinutes(T0, 75),
    });
    expect(window.allottedMinutes).toBe(45);
  });

  it('tolerates a start up to five minutes in the past', () => {
    expect(() =>
      resolveRequestedWindow({ now: T0, allottedMinutes: 10, startTime: addMinutes(T0, -5) }),
    ).not.toThrow();

    const err = catchAppError(() =>
      resolveRequestedWindow({ now: T0, allottedMinutes: 10, startTime: addMinutes(T0, -6) }),
    );
    expect(err.code).toBe('VALIDATION_ERROR');
    expect(err.message).toBe('Start time is in the past.');
  });

  it('rejects a start more than a day ahead, an end before start, and passes over 240 minutes', () => {
    expect(
      catchAppError(() =>
        resolveRequestedWindow({ now: T0, allottedMinutes: 10, startTime: addMinutes(T0, 24 * 60 + 1) }),
      ).message,
    ).toBe('Start time is more than a day ahead.');

    expect(
      catchAppError(() => resolveRequestedWindow({ now: T0, allottedMinutes: 10, endTime: T0 })).message,
    ).toBe('End time must be after start time.');

    expect(
      catchAppError(() =>
        resolveRequestedWindow({ now: T0, allottedMinutes: 10, endTime: addMinutes(T0, 241) }),
      ).message,
    ).toBe('A pass cannot last more than 240 minutes.');
  });
});

describe('activation window', () => {
  const pass = makePass({ requestedStartTime: addMinutes(T0, 10) });

  it('is premature before the requested start', () => {
    expect(activationWindowState(pass, school, addMinutes(T0, 9))).toBe('premature');
  });

  it('is open from the start through the window end, inclusive', () => {
    expect(activationWindowState(pass, school, addMinutes(T0, 10))).toBe('open');
    expect(activationWindowState(pass, school, addMinutes(T0, 25))).toBe('open');
  });

  it('has elapsed after the window end', () => {
    expect(activationWindowState(pass, school, addMinutes(T0, 26))).toBe('elapsed');
  });
});

describe('expiry deadlines', () => {
  it('uses the activation window for pending and approved passes', () => {
    const pending = makePass({ status: 'pending' });
    expect(expiryDeadline(pending, school)).toEqual(addMinutes(T0, 15));
    expect(isExpiryDue(pending, school, addMinutes(T0, 15))).toBe(false);
    expect(isExpiryDue(pending, school, new Date(addMinutes(T0, 15).getTime() + 1))).toBe(true);
  });

  it('uses return time plus grace for active passes', () => {
    const active = makePass({ status: 'active', actualStartTime: addMinutes(T0, 2), allottedMinutes: 10 });

    expect(returnBy(active)).toEqual(addMinutes(T0, 12));
    expect(expiryDeadline(active, school)).toEqual(addMinutes(T0, 17));
    expect(isExpiryDue(active, school, addMinutes(T0, 17))).toBe(false);
    expect(isExpiryDue(active, school, addMinutes(T0, 18))).toBe(true);
  });

  it('never expires a terminal pass', () => {
    const completed = makePass({ status: 'completed' });
    expect(expiryDeadline(completed, school)).toBeNull();
    expect(isExpiryDue(completed, school, addMinutes(T0, 10_000))).toBe(false);
  });
});
