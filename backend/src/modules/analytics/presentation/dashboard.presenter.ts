/**
 * backend/src/modules/analytics/presentation/dashboard.presenter.ts
 *
 * Maps aggregates to dashboard payloads. Below the minimum sample a figure
 * becomes INSUFFICIENT_DATA instead of a misleading 0.
 */

import type {
  AnalyticsWindow,
  HourBucket,
  Metric,
  SchoolAggregate,
  SchoolDashboard,
  SliceAggregate,
  StudentDashboard,
  StudentSummary,
  TeacherDashboard,
} from '../analytics.types';

export type PresenterOptions = Readonly<{
  /** Completed passes needed before an average is shown. */
  minSample: number;
}>;

export function toMetric<T>(value: T | null, sampleSize: number, required: number): Metric<T> {
  if (value === null || sampleSize < required) {
    return { status: 'INSUFFICIENT_DATA', sampleSize, required };
  }
  return { status: 'OK', value, sampleSize };
}

function peakHoursMetric(school: SchoolAggregate): Metric<HourBucket[]> {
  // one request is enough to have a busiest hour
  return toMetric(school.peakRequestHours, school.requestCount, 1);
}

export function presentTeacherDashboard(input: {
  window: AnalyticsWindow;
  generatedAt: Date;
  teacher: SliceAggregate;
  school: SchoolAggregate;
  options: PresenterOptions;
}): TeacherDashboard {
  const { teacher, school, options } = input;
  return {
    scope: 'teacher',
    window: input.window,
    generatedAt: input.generatedAt,
    teacher: {
      grantedCount: teacher.grantedCount,
      completedCount: teacher.completedCount,
      avgAbsenceMinutes: toMetric(teacher.avgAbsenceMinutes, teacher.completedCount, options.minSample),
    },
    schoolComparison: {
      avgGrantedPerTeacher: toMetric(school.avgGrantedPerTeacher, school.teacherCount, 1),
      avgAbsenceMinutes: toMetric(school.avgAbsenceMinutes, school.completedCount, options.minSample),
    },
  };
}

export function presentSchoolDashboard(input: {
  window: AnalyticsWindow;
  generatedAt: Date;
  school: SchoolAggregate;
  occupancy: { activeNow: number; limit: number };
  options: PresenterOptions;
}): SchoolDashboard {
  const { school, options } = input;
  return {
    scope: 'school',
    window: input.window,
    generatedAt: input.generatedAt,
    school: {
      grantedCount: school.grantedCount,
      completedCount: school.completedCount,
      requestCount: school.requestCount,
      avgAbsenceMinutes: toMetric(school.avgAbsenceMinutes, school.completedCount, options.minSample),
      avgGrantedPerTeacher: toMetric(school.avgGrantedPerTeacher, school.teacherCount, 1),
      peakRequestHours: peakHoursMetric(school),
    },
    occupancy: input.occupancy,
  };
}

/** Counts and passes only, so nothing here needs the sentinel. */
export function presentStudentDashboard(input: {
  window: AnalyticsWindow;
  generatedAt: Date;
  summary: StudentSummary;
}): StudentDashboard {
  return {
    scope: 'student',
    window: input.window,
    generatedAt: input.generatedAt,
    ...input.summary,
  };
}
