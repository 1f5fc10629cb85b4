import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { PassesTable } from '../../../shared/db/schema';
import { OPEN_PASS_STATUSES, type PassListFilter } from '../pass.types';

/**
 * DAL READS ONLY
 * - No AppError
 * - No policies
 * - No transactions started here
 */
export type PassRow = Selectable<PassesTable>;

export async function selectPassByIdSql(
  db: DbExecutor,
  schoolId: string,
  passId: string,
): Promise<PassRow | undefined> {
  return db
    .selectFrom('passes')
    .selectAll()
    .where('id', '=', passId)
    .where('school_id', '=', schoolId)
    .executeTakeFirst();
}

export async function selectPassesSql(db: DbExecutor, filter: PassListFilter): Promise<PassRow[]> {
  if (filter.statuses && filter.statuses.length === 0) return [];

  let query = db.selectFrom('passes').selectAll().where('school_id', '=', filter.schoolId);

  if (filter.studentId) query = query.where('student_id', '=', filter.studentId);
  if (filter.approverId) query = query.where('approver_id', '=', filter.approverId);
  if (filter.statuses) query = query.where('status', 'in', [...filter.statuses]);
  if (filter.createdSince) query = query.where('created_at', '>=', filter.createdSince);

  query = query.orderBy('created_at', 'desc');
  if (filter.limit) query = query.limit(filter.limit);

  return query.execute();
}

export async function countActivePassesSql(db: DbExecutor, schoolId: string): Promise<number> {
  const row = await db
    .selectFrom('passes')
    .select((eb) => eb.fn.countAll().as('count'))
    .where('school_id', '=', schoolId)
    .where('status', '=', 'active')
    .executeTakeFirst();

  return Number(row?.count ?? 0);
}

export async function selectConcurrentPassLimitSql(
  db: DbExecutor,
  schoolId: string,
): Promise<number | undefined> {
  const row = await db
    .selectFrom('schools')
    .select('concurrent_pass_limit')
    .where('id', '=', schoolId)
    .executeTakeFirst();

  return row?.concurrent_pass_limit;
}

export async function selectOpenPassForStudentSql(
  db: DbExecutor,
  schoolId: string,
  studentId: string,
): Promise<PassRow | undefined> {
  return db
    .selectFrom('passes')
    .selectAll()
    .where('school_id', '=', schoolId)
    .where('student_id', '=', studentId)
    .where('status', 'in', [...OPEN_PASS_STATUSES])
    .executeTakeFirst();
}

export async function selectActivePassByCodeSql(
  db: DbExecutor,
  schoolId: string,
  code: string,
): Promise<PassRow | undefined> {
  return db
    .selectFrom('passes')
    .selectAll()
    .where('school_id', '=', schoolId)
    .where('status', '=', 'active')
    .where('verification_code', '=', code)
    .executeTakeFirst();
}

export async function selectSchoolIdsWithOpenPassesSql(db: DbExecutor): Promise<string[]> {
  const rows = await db
    .selectFrom('passes')
    .select('school_id')
    .distinct()
    .where('status', 'in', [...OPEN_PASS_STATUSES])
    .execute();

  return rows.map((r) => r.school_id);
}

/** Serializes pass writes per school. Must run inside a transaction. */
export async function lockSchoolRowSql(db: DbExecutor, schoolId: string): Promise<void> {
  await db.selectFrom('schools').select('id').where('id', '=', schoolId).forUpdate().execute();
}
