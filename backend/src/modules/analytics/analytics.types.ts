/**
 * backend/src/modules/analytics/analytics.types.ts
 *
 * WHY:
 * - Aggregates are what the data says (possibly empty). Dashboards are what a
 *   client shows, including the "not enough data" sentinel.
 */

import type { Pass } from '../passes';

export const ANALYTICS_WINDOWS = ['7d', '30d'] as const;
export type AnalyticsWindow = (typeof ANALYTICS_WINDOWS)[number];

export const WINDOW_DAYS: Readonly<Record<AnalyticsWindow, number>> = {
  '7d': 7,
  '30d': 30,
};

export type HourBucket = Readonly<{ hour: number; count: number }>;

export type SliceAggregate = Readonly<{
  grantedCount: number;
  completedCount: number;
  /** null when no completed pass carries a duration. */
  avgAbsenceMinutes: number | null;
}>;

export type SchoolAggregate = SliceAggregate &
  Readonly<{
    requestCount: number;
    /** Distinct staff members who approved or issued at least one granted pass. */
    teacherCount: number;
    avgGrantedPerTeacher: number | null;
    /** Most requested hours of the day in the school timezone, busiest first. */
    peakRequestHours: HourBucket[];
  }>;

export type Metric<T> =
  | Readonly<{ status: 'OK'; value: T; sampleSize: number }>
  | Readonly<{ status: 'INSUFFICIENT_DATA'; sampleSize: number; required: number }>;

export type TeacherDashboard = Readonly<{
  scope: 'teacher';
  window: AnalyticsWindow;
  generatedAt: Date;
  teacher: Readonly<{
    grantedCount: number;
    completedCount: number;
    avgAbsenceMinutes: Metric<number>;
  }>;
  schoolComparison: Readonly<{
    avgGrantedPerTeacher: Metric<number>;
    avgAbsenceMinutes: Metric<number>;
  }>;
}>;

export type SchoolDashboard = Readonly<{
  scope: 'school';
  window: AnalyticsWindow;
  generatedAt: Date;
  school: Readonly<{
    grantedCount: number;
    completedCount: number;
    requestCount: number;
    avgAbsenceMinutes: Metric<number>;
    avgGrantedPerTeacher: Metric<number>;
    peakRequestHours: Metric<HourBucket[]>;
  }>;
  occupancy: Readonly<{ activeNow: number; limit: number }>;
}>;

export type StudentSummary = Readonly<{
  /** Newest first. */
  recentPasses: Pass[];
  activePass: Pass | null;
  /** Passes created within the window. */
  totalPasses: number;
}>;

export type StudentDashboard = Readonly<{
  scope: 'student';
  window: AnalyticsWindow;
  generatedAt: Date;
}> &
  StudentSummary;

export type DashboardMetrics = TeacherDashboard | SchoolDashboard | StudentDashboard;
