/**
 * backend/src/modules/schools/school.service.ts
 *
 * WHY:
 * - School configuration: read settings, change them, manage locations.
 *
 * RULES:
 * - Every call is scoped to the actor's own school.
 * - Changes are audited.
 * - Settings changes hold the school's activation lock; the cap may not drop
 *   below the passes currently active.
 */

import type { Logger } from '../../shared/logger/logger';
import type { AuditSink } from '../../shared/audit/audit.types';
import type { Clock } from '../../shared/time/clock';
import type { RequestMeta } from '../../shared/http/require-auth-context';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { Actor, AuthorizationGuard } from '../access';

import type { Location, NewLocation, School, SchoolSettingsPatch, SchoolSnapshot } from './school.types';
import type { SchoolCapacityLock, SchoolStore } from './store/school.store';
import { assertLocationNameAvailable, assertSchoolExists } from './policies/school-snapshot.policy';
import { SchoolErrors } from './school.errors';

export class SchoolService {
  constructor(
    private readonly deps: {
      schoolStore: SchoolStore;
      capacityLock: SchoolCapacityLock;
      guard: AuthorizationGuard;
      auditSink: AuditSink;
      clock: Clock;
      logger: Logger;
    },
  ) {}

  async requireSnapshot(schoolId: string): Promise<SchoolSnapshot> {
    const snapshot = await this.deps.schoolStore.getSnapshot(schoolId);
    assertSchoolExists(snapshot, schoolId);
    return snapshot;
  }

  async getSchool(actor: Actor): Promise<School> {
    this.deps.guard.assert(actor, 'school.view', { kind: 'school', schoolId: actor.schoolId });
    const { school } = await this.requireSnapshot(actor.schoolId);
    return school;
  }

  /** Every role reads locations; students only see active ones. */
  async listLocations(actor: Actor): Promise<readonly Location[]> {
    const { locations } = await this.requireSnapshot(actor.schoolId);
    return actor.role === 'student' ? locations.filter((l) => l.isActive) : locations;
  }

  async updateSettings(
    actor: Actor,
    patch: SchoolSettingsPatch,
    meta: RequestMeta,
  ): Promise<School> {
    this.deps.guard.assert(actor, 'school.configure', { kind: 'school', schoolId: actor.schoolId });

    const requestedLimit = patch.concurrentPassLimit;
    const updated = await this.deps.capacityLock.withCapacityLock(
      actor.schoolId,
      async ({ activeCount, schools }) => {
        if (requestedLimit !== undefined && requestedLimit < activeCount) {
          throw SchoolErrors.limitBelowActive({ requestedLimit, activeCount });
        }
        return schools.updateSettings(actor.schoolId, patch, this.deps.clock.now());
      },
    );
    if (!updated) throw SchoolErrors.schoolNotFound({ schoolId: actor.schoolId });

    await this.audit(actor, meta).append('school.settings.updated', {
      fields: Object.keys(patch),
    });

    this.deps.logger.info('school.settings.updated', {
      flow: 'schools.update',
      schoolId: actor.schoolId,
      userId: actor.userId,
      fields: Object.keys(patch),
    });

    return updated;
  }

  async createLocation(actor: Actor, input: NewLocation, meta: RequestMeta): Promise<Location> {
    this.deps.guard.assert(actor, 'school.configure', { kind: 'school', schoolId: actor.schoolId });

    const { locations } = await this.requireSnapshot(actor.schoolId);
    assertLocationNameAvailable(locations, input.name);

    const location = await this.deps.schoolStore.createLocation(actor.schoolId, input);

    await this.audit(actor, meta).append('school.location.created', {
      locationId: location.id,
      name: location.name,
    });

    return location;
  }

  private audit(actor: Actor, meta: RequestMeta): AuditWriter {
    return new AuditWriter(this.deps.auditSink, {
      schoolId: actor.schoolId,
      userId: actor.userId,
      ...meta,
    });
  }
}
