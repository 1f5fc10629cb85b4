/**
 * backend/src/modules/analytics/aggregation/analytics-aggregator.ts
 *
 * WHY:
 * - Pure arithmetic over already-loaded passes. Always computes, even over an
 *   empty list; deciding what is "too little data" belongs to the presenter.
 *
 * RULES:
 * - Granted = a decision was recorded (approval, staff issue or auto-approval) and it was not a denial.
 * - Absence averages use completed passes only.
 */

import type { Pass } from '../../passes';
import {
  WINDOW_DAYS,
  type AnalyticsWindow,
  type HourBucket,
  type SchoolAggregate,
  type SliceAggregate,
  type StudentSummary,
} from '../analytics.types';

const DAY_MS = 24 * 60 * 60 * 1000;
export const PEAK_HOUR_BUCKETS = 3;
export const RECENT_PASS_LIMIT = 10;

export type PassSample = Pick<
  Pass,
  'status' | 'approverId' | 'durationMinutes' | 'createdAt' | 'decidedAt'
>;

export function windowStart(window: AnalyticsWindow, now: Date): Date {
  return new Date(now.getTime() - WINDOW_DAYS[window] * DAY_MS);
}

export function isGranted(pass: PassSample): boolean {
  return pass.decidedAt !== null && pass.status !== 'denied';
}

function roundTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return roundTenth(values.reduce((sum, v) => sum + v, 0) / values.length);
}

export function aggregateSlice(passes: readonly PassSample[]): SliceAggregate {
  const durations: number[] = [];
  for (const p of passes) {
    if (p.status === 'completed' && p.durationMinutes !== null) durations.push(p.durationMinutes);
  }

  return {
    grantedCount: passes.filter(isGranted).length,
    completedCount: durations.length,
    avgAbsenceMinutes: mean(durations),
  };
}

/** Passes the teacher approved, denied or issued. */
export function aggregateTeacher(passes: readonly PassSample[], teacherId: string): SliceAggregate {
  return aggregateSlice(passes.filter((p) => p.approverId === teacherId));
}

function hourFormatter(timeZone: string): (date: Date) => number {
  const format = new Intl.DateTimeFormat('en-US', { timeZone, hour: 'numeric', hourCycle: 'h23' });
  return (date) => {
    const hour = format.formatToParts(date).find((part) => part.type === 'hour');
    return hour ? Number(hour.value) % 24 : 0;
  };
}

export function peakRequestHours(
  passes: readonly PassSample[],
  timeZone: string,
  top = PEAK_HOUR_BUCKETS,
): HourBucket[] {
  const hourOf = hourFormatter(timeZone);
  const counts = new Map<number, number>();
  for (const p of passes) {
    const hour = hourOf(p.createdAt);
    counts.set(hour, (counts.get(hour) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([hour, count]) => ({ hour, count }))
    .sort((a, b) => b.count - a.count || a.hour - b.hour)
    .slice(0, top);
}

export function aggregateSchool(passes: readonly PassSample[], timeZone: string): SchoolAggregate {
  const slice = aggregateSlice(passes);

  const grantedByStaff = passes.filter((p) => isGranted(p) && p.approverId !== null);
  const teacherCount = new Set(grantedByStaff.map((p) => p.approverId)).size;

  return {
    ...slice,
    requestCount: passes.length,
    teacherCount,
    avgGrantedPerTeacher: teacherCount > 0 ? roundTenth(grantedByStaff.length / teacherCount) : null,
    peakRequestHours: peakRequestHours(passes, timeZone),
  };
}

/** `passes` are one student's, newest first. */
export function summarizeStudent(passes: readonly Pass[], since: Date): StudentSummary {
  return {
    recentPasses: passes.slice(0, RECENT_PASS_LIMIT),
    activePass: passes.find((p) => p.status === 'active') ?? null,
    totalPasses: passes.filter((p) => p.createdAt >= since).length,
  };
}
