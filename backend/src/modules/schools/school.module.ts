/**
 * backend/src/modules/schools/school.module.ts
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { AuditSink } from '../../shared/audit/audit.types';
import type { Clock } from '../../shared/time/clock';
import type { AuthorizationGuard } from '../access';

import type { SchoolCapacityLock, SchoolStore } from './store/school.store';
import { SchoolController } from './school.controller';
import { SchoolService } from './school.service';
import { registerSchoolRoutes } from './school.routes';

export type SchoolModule = ReturnType<typeof createSchoolModule>;

export function createSchoolModule(deps: {
  schoolStore: SchoolStore;
  capacityLock: SchoolCapacityLock;
  guard: AuthorizationGuard;
  auditSink: AuditSink;
  clock: Clock;
  logger: Logger;
}) {
  const schoolService = new SchoolService(deps);
  const controller = new SchoolController(schoolService);

  return {
    schoolService,
    registerRoutes(app: FastifyInstance) {
      registerSchoolRoutes(app, controller);
    },
  };
}
