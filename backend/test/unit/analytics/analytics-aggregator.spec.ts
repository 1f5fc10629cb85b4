import { describe, it, expect } from 'vitest';
import {
  aggregateSchool,
  aggregateSlice,
  aggregateTeacher,
  isGranted,
  peakRequestHours,
  RECENT_PASS_LIMIT,
  summarizeStudent,
  windowStart,
  type PassSample,
} from '../../../src/modules/analytics/aggregation/analytics-aggregator';
import { T0 } from '../../helpers/manual-clock';
import { makePass } from '../../helpers/pass-factory';

function sample(overrides: Partial<PassSample> = {}): PassSample {
  return {
    status: 'completed',
    approverId: 'tch-1',
    durationMinutes: 10,
    createdAt: T0,
    decidedAt: T0,
    ...overrides,
  };
}

function at(iso: string): Date {
  return new Date(iso);
}

describe('windowStart', () => {
  it('reaches back whole days', () => {
    expect(windowStart('7d', T0).toISOString()).toBe('2026-02-23T14:00:00.000Z');
    expect(windowStart('30d', T0).toISOString()).toBe('2026-01-31T14:00:00.000Z');
  });
});

describe('isGranted', () => {
  it('counts decided passes that were not denied', () => {
    expect(isGranted(sample())).toBe(true);
    expect(isGranted(sample({ status: 'expired' }))).toBe(true);
    expect(isGranted(sample({ status: 'denied' }))).toBe(false);
    expect(isGranted(sample({ status: 'pending', decidedAt: null }))).toBe(false);
  });
});

describe('aggregateSlice', () => {
  it('averages completed durations to one decimal', () => {
    const agg = aggregateSlice([
      sample({ durationMinutes: 10 }),
      sample({ durationMinutes: 15 }),
      sample({ durationMinutes: 12 }),
      sample({ status: 'active', durationMinutes: null }),
    ]);

    expect(agg).toEqual({ grantedCount: 4, completedCount: 3, avgAbsenceMinutes: 12.3 });
  });

  it('reports no average for an empty slice', () => {
    expect(aggregateSlice([])).toEqual({ grantedCount: 0, completedCount: 0, avgAbsenceMinutes: null });
  });
});

describe('aggregateTeacher', () => {
  it('only counts passes the teacher decided or issued', () => {
    const agg = aggregateTeacher(
      [
        sample({ approverId: 'tch-1', durationMinutes: 8 }),
        sample({ approverId: 'tch-2', durationMinutes: 30 }),
        sample({ approverId: null, durationMinutes: 20 }),
      ],
      'tch-1',
    );
    expect(agg).toEqual({ grantedCount: 1, completedCount: 1, avgAbsenceMinutes: 8 });
  });
});

describe('peakRequestHours', () => {
  it('buckets by hour in the school timezone, busiest first then earliest', () => {
    const passes = [
      sample({ createdAt: at('2026-03-02T14:05:00Z') }),
      sample({ createdAt: at('2026-03-02T14:40:00Z') }),
      sample({ createdAt: at('2026-03-02T16:10:00Z') }),
      sample({ createdAt: at('2026-03-02T13:10:00Z') }),
      sample({ createdAt: at('2026-03-02T18:10:00Z') }),
    ];

    expect(peakRequestHours(passes, 'America/New_York')).toEqual([
      { hour: 9, count: 2 },
      { hour: 8, count: 1 },
      { hour: 11, count: 1 },
    ]);
  });

  it('returns nothing without requests', () => {
    expect(peakRequestHours([], 'UTC')).toEqual([]);
  });
});

describe('aggregateSchool', () => {
  it('averages granted passes over distinct staff approvers', () => {
    const agg = aggregateSchool(
      [
        sample({ approverId: 'tch-1' }),
        sample({ approverId: 'tch-1' }),
        sample({ approverId: 'tch-2' }),
        sample({ approverId: null }),
        sample({ approverId: 'tch-2', status: 'denied', durationMinutes: null }),
      ],
      'UTC',
    );

    expect(agg.requestCount).toBe(5);
    expect(agg.grantedCount).toBe(4);
    expect(agg.teacherCount).toBe(2);
    expect(agg.avgGrantedPerTeacher).toBe(1.5);
    expect(agg.peakRequestHours).toEqual([{ hour: 14, count: 5 }]);
  });

  it('has no per-teacher average when only auto-approvals exist', () => {
    const agg = aggregateSchool([sample({ approverId: null })], 'UTC');
    expect(agg.teacherCount).toBe(0);
    expect(agg.avgGrantedPerTeacher).toBeNull();
  });
});

describe('summarizeStudent', () => {
  const HOUR_MS = 60 * 60_000;

  it('keeps the newest passes and counts those inside the window', () => {
    // newest first, one hour apart
    const passes = Array.from({ length: 12 }, (_, i) =>
      makePass({ id: `pass-${i}`, status: 'completed', createdAt: new Date(T0.getTime() - i * HOUR_MS) }),
    );

    const summary = summarizeStudent(passes, new Date(T0.getTime() - 2 * HOUR_MS));

    expect(summary.recentPasses).toHaveLength(RECENT_PASS_LIMIT);
    expect(summary.recentPasses[0]?.id).toBe('pass-0');
    expect(summary.activePass).toBeNull();
    expect(summary.totalPasses).toBe(3);
  });

  it('picks out the active pass', () => {
    const active = makePass({ id: 'out-now', status: 'active', verificationCode: 'QR-ABCDEFGH' });
    const summary = summarizeStudent([active, makePass({ status: 'completed' })], T0);

    expect(summary.activePass).toEqual(active);
    expect(summary.totalPasses).toBe(2);
  });
});
