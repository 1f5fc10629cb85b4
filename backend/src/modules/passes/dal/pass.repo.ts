/**
 * backend/src/modules/passes/dal/pass.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for passes.
 *
 * RULES:
 * - No transactions started here (the store owns tx).
 * - No AppError. No policies.
 * - Updates are conditional on the expected status (compare-and-set).
 */

import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { PassesTable } from '../../../shared/db/schema';
import type { NewPass, PassPatch, PassStatus } from '../pass.types';
import type { PassRow } from './pass.query-sql';

function toUpdate(patch: PassPatch): Updateable<PassesTable> {
  const values: Updateable<PassesTable> = { updated_at: patch.updatedAt };
  if (patch.status !== undefined) values.status = patch.status;
  if (patch.approverId !== undefined) values.approver_id = patch.approverId;
  if (patch.actualStartTime !== undefined) values.actual_start_time = patch.actualStartTime;
  if (patch.actualEndTime !== undefined) values.actual_end_time = patch.actualEndTime;
  if (patch.durationMinutes !== undefined) values.duration_minutes = patch.durationMinutes;
  if (patch.verificationCode !== undefined) values.verification_code = patch.verificationCode;
  if (patch.approvalNotes !== undefined) values.approval_notes = patch.approvalNotes;
  if (patch.adminNotes !== undefined) values.admin_notes = patch.adminNotes;
  if (patch.decidedAt !== undefined) values.decided_at = patch.decidedAt;
  if (patch.expiredAt !== undefined) values.expired_at = patch.expiredAt;
  return values;
}

export class PassRepo {
  constructor(private readonly db: DbExecutor) {}

  async insertPass(pass: NewPass): Promise<PassRow> {
    return this.db
      .insertInto('passes')
      .values({
        school_id: pass.schoolId,
        student_id: pass.studentId,
        location_id: pass.locationId,
        issued_by_id: pass.issuedById,
        approver_id: pass.approverId,
        status: pass.status,
        requested_start_time: pass.requestedStartTime,
        requested_end_time: pass.requestedEndTime,
        allotted_minutes: pass.allottedMinutes,
        actual_start_time: pass.actualStartTime,
        actual_end_time: pass.actualEndTime,
        duration_minutes: pass.durationMinutes,
        verification_code: pass.verificationCode,
        is_summons: pass.isSummons,
        is_early_release: pass.isEarlyRelease,
        student_reason: pass.studentReason,
        approval_notes: pass.approvalNotes,
        admin_notes: pass.adminNotes,
        decided_at: pass.decidedAt,
        expired_at: pass.expiredAt,
        created_at: pass.createdAt,
        updated_at: pass.updatedAt,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /** Returns undefined when the pass is no longer in `expected` status. */
  async updatePassIfStatus(
    passId: string,
    expected: PassStatus,
    patch: PassPatch,
  ): Promise<PassRow | undefined> {
    return this.db
      .updateTable('passes')
      .set(toUpdate(patch))
      .where('id', '=', passId)
      .where('status', '=', expected)
      .returningAll()
      .executeTakeFirst();
  }
}
