/**
 * backend/src/modules/passes/queries/pass.queries.ts
 *
 * WHY:
 * - Shape pass rows into the Pass domain type.
 *
 * RULES:
 * - Read-only. No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { isPassStatus, type Pass, type PassListFilter } from '../pass.types';
import {
  selectActivePassByCodeSql,
  selectOpenPassForStudentSql,
  selectPassByIdSql,
  selectPassesSql,
  type PassRow,
} from '../dal/pass.query-sql';

export function toPass(row: PassRow): Pass {
  if (!isPassStatus(row.status)) {
    // the CHECK constraint makes this unreachable unless the schema drifted
    throw new Error(`passes.status has unexpected value: ${row.status}`);
  }

  return {
    id: row.id,
    schoolId: row.school_id,
    studentId: row.student_id,
    locationId: row.location_id,
    issuedById: row.issued_by_id,
    approverId: row.approver_id,
    status: row.status,
    requestedStartTime: row.requested_start_time,
    requestedEndTime: row.requested_end_time,
    allottedMinutes: row.allotted_minutes,
    actualStartTime: row.actual_start_time,
    actualEndTime: row.actual_end_time,
    durationMinutes: row.duration_minutes,
    verificationCode: row.verification_code,
    isSummons: row.is_summons,
    isEarlyRelease: row.is_early_release,
    studentReason: row.student_reason,
    approvalNotes: row.approval_notes,
    adminNotes: row.admin_notes,
    decidedAt: row.decided_at,
    expiredAt: row.expired_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getPassById(
  db: DbExecutor,
  schoolId: string,
  passId: string,
): Promise<Pass | undefined> {
  const row = await selectPassByIdSql(db, schoolId, passId);
  return row ? toPass(row) : undefined;
}

export async function listPasses(db: DbExecutor, filter: PassListFilter): Promise<Pass[]> {
  const rows = await selectPassesSql(db, filter);
  return rows.map(toPass);
}

export async function getOpenPassForStudent(
  db: DbExecutor,
  schoolId: string,
  studentId: string,
): Promise<Pass | undefined> {
  const row = await selectOpenPassForStudentSql(db, schoolId, studentId);
  return row ? toPass(row) : undefined;
}

export async function getActivePassByCode(
  db: DbExecutor,
  schoolId: string,
  code: string,
): Promise<Pass | undefined> {
  const row = await selectActivePassByCodeSql(db, schoolId, code);
  return row ? toPass(row) : undefined;
}
