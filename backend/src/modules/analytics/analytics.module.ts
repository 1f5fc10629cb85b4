/**
 * backend/src/modules/analytics/analytics.module.ts
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';
import type { AuthorizationGuard } from '../access';
import type { SchoolStore } from '../schools';
import type { PassService } from '../passes';

import { AnalyticsController } from './analytics.controller';
import { AnalyticsService } from './analytics.service';
import { registerAnalyticsRoutes } from './analytics.routes';

export type AnalyticsModule = ReturnType<typeof createAnalyticsModule>;

export function createAnalyticsModule(deps: {
  passService: PassService;
  schoolStore: SchoolStore;
  guard: AuthorizationGuard;
  clock: Clock;
  logger: Logger;
  minSample: number;
}) {
  const analyticsService = new AnalyticsService({ ...deps, passes: deps.passService });
  const controller = new AnalyticsController(analyticsService);

  return {
    analyticsService,
    registerRoutes(app: FastifyInstance) {
      registerAnalyticsRoutes(app, controller);
    },
  };
}
