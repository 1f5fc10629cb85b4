/**
 * backend/src/modules/schools/dal/school.repo.ts
 *
 * WHY:
 * - Writes for school settings and locations.
 *
 * RULES:
 * - No AppError. No policies. Takes db or trx.
 */

import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { SchoolsTable } from '../../../shared/db/schema';
import type { NewLocation, SchoolSettingsPatch } from '../school.types';
import type { LocationRow, SchoolRow } from './school.query-sql';

export class SchoolRepo {
  constructor(private readonly db: DbExecutor) {}

  async updateSettings(
    schoolId: string,
    patch: SchoolSettingsPatch,
    now: Date,
  ): Promise<SchoolRow | undefined> {
    const values: Updateable<SchoolsTable> = { updated_at: now };
    if (patch.name !== undefined) values.name = patch.name;
    if (patch.timezone !== undefined) values.timezone = patch.timezone;
    if (patch.concurrentPassLimit !== undefined) {
      values.concurrent_pass_limit = patch.concurrentPassLimit;
    }
    if (patch.defaultPassDuration !== undefined) {
      values.default_pass_duration = patch.defaultPassDuration;
    }
    if (patch.activationWindowMinutes !== undefined) {
      values.activation_window_minutes = patch.activationWindowMinutes;
    }
    if (patch.overdueGraceMinutes !== undefined) {
      values.overdue_grace_minutes = patch.overdueGraceMinutes;
    }
    if (patch.preApprovedRules !== undefined) {
      values.pre_approved_rules = JSON.stringify(patch.preApprovedRules);
    }

    return this.db
      .updateTable('schools')
      .set(values)
      .where('id', '=', schoolId)
      .returningAll()
      .executeTakeFirst();
  }

  async insertLocation(schoolId: string, input: NewLocation): Promise<LocationRow> {
    return this.db
      .insertInto('locations')
      .values({
        school_id: schoolId,
        name: input.name,
        description: input.description ?? null,
        room_number: input.roomNumber ?? null,
        default_duration: input.defaultDuration ?? null,
        requires_approval: input.requiresApproval ?? true,
        summons_only: input.summonsOnly ?? false,
        early_release_only: input.earlyReleaseOnly ?? false,
        is_active: input.isActive ?? true,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }
}
