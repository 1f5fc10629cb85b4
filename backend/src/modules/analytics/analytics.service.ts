/**
 * backend/src/modules/analytics/analytics.service.ts
 *
 * WHY:
 * - getDashboardMetrics: administrators get the school dashboard, teachers get
 *   their own figures next to the school's, students get their pass history.
 *   The student view reads through the pass service so lazy expiry applies.
 *
 * RULES:
 * - The fetch and the aggregation always run; the presenter decides what is shown.
 */

import type { Logger } from '../../shared/logger/logger';
import type { RequestMeta } from '../../shared/http/require-auth-context';
import type { Clock } from '../../shared/time/clock';
import type { Actor, AuthorizationGuard } from '../access';
import { assertSchoolExists, type SchoolStore } from '../schools';
import type { PassService } from '../passes';

import type { AnalyticsWindow, DashboardMetrics, StudentDashboard } from './analytics.types';
import {
  aggregateSchool,
  aggregateTeacher,
  summarizeStudent,
  windowStart,
} from './aggregation/analytics-aggregator';
import {
  presentSchoolDashboard,
  presentStudentDashboard,
  presentTeacherDashboard,
} from './presentation/dashboard.presenter';

export class AnalyticsService {
  constructor(
    private readonly deps: {
      passes: Pick<PassService, 'loadWindow' | 'listMyPasses'>;
      schoolStore: SchoolStore;
      guard: AuthorizationGuard;
      clock: Clock;
      logger: Logger;
      minSample: number;
    },
  ) {}

  async getDashboardMetrics(
    actor: Actor,
    window: AnalyticsWindow,
    meta: RequestMeta,
  ): Promise<DashboardMetrics> {
    if (actor.role === 'student') return this.studentDashboard(actor, window, meta);

    const schoolWide = actor.role === 'administrator';
    this.deps.guard.assert(actor, schoolWide ? 'analytics.school' : 'analytics.teacher', {
      kind: 'school',
      schoolId: actor.schoolId,
    });

    const snapshot = await this.deps.schoolStore.getSnapshot(actor.schoolId);
    assertSchoolExists(snapshot, actor.schoolId);
    const { school } = snapshot;

    const now = this.deps.clock.now();
    const { passes, activeCount } = await this.deps.passes.loadWindow(school, windowStart(window, now));

    const schoolAggregate = aggregateSchool(passes, school.timezone);
    const options = { minSample: this.deps.minSample };

    this.deps.logger.info('analytics.dashboard', {
      flow: 'analytics.dashboard',
      schoolId: school.id,
      userId: actor.userId,
      scope: schoolWide ? 'school' : 'teacher',
      window,
      sampleSize: passes.length,
    });

    if (schoolWide) {
      return presentSchoolDashboard({
        window,
        generatedAt: now,
        school: schoolAggregate,
        occupancy: { activeNow: activeCount, limit: school.concurrentPassLimit },
        options,
      });
    }

    return presentTeacherDashboard({
      window,
      generatedAt: now,
      teacher: aggregateTeacher(passes, actor.userId),
      school: schoolAggregate,
      options,
    });
  }

  private async studentDashboard(
    actor: Actor,
    window: AnalyticsWindow,
    meta: RequestMeta,
  ): Promise<StudentDashboard> {
    this.deps.guard.assert(actor, 'analytics.student', { kind: 'school', schoolId: actor.schoolId });

    const now = this.deps.clock.now();
    const passes = await this.deps.passes.listMyPasses(actor, meta);

    this.deps.logger.info('analytics.dashboard', {
      flow: 'analytics.dashboard',
      schoolId: actor.schoolId,
      userId: actor.userId,
      scope: 'student',
      window,
      sampleSize: passes.length,
    });

    return presentStudentDashboard({
      window,
      generatedAt: now,
      summary: summarizeStudent(passes, windowStart(window, now)),
    });
  }
}
