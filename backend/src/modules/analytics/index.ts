export type {
  AnalyticsWindow,
  DashboardMetrics,
  HourBucket,
  Metric,
  SchoolDashboard,
  StudentDashboard,
  TeacherDashboard,
} from './analytics.types';
export { ANALYTICS_WINDOWS } from './analytics.types';
export { AnalyticsService } from './analytics.service';
export { createAnalyticsModule, type AnalyticsModule } from './analytics.module';
