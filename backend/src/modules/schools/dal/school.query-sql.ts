import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { LocationsTable, SchoolsTable } from '../../../shared/db/schema';

/**
 * DAL READS ONLY
 * - No AppError
 * - No policies
 * - No transactions started here
 */
export type SchoolRow = Selectable<SchoolsTable>;
export type LocationRow = Selectable<LocationsTable>;

export async function selectSchoolByIdSql(
  db: DbExecutor,
  schoolId: string,
): Promise<SchoolRow | undefined> {
  return db.selectFrom('schools').selectAll().where('id', '=', schoolId).executeTakeFirst();
}

export async function selectLocationsBySchoolSql(
  db: DbExecutor,
  schoolId: string,
): Promise<LocationRow[]> {
  return db
    .selectFrom('locations')
    .selectAll()
    .where('school_id', '=', schoolId)
    .orderBy('name', 'asc')
    .execute();
}
