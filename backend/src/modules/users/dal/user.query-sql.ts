/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * RULES:
 * - DAL READS ONLY. No AppError. No policies.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/schema';

export type UserRow = Selectable<UsersTable>;

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('id', '=', userId).executeTakeFirst();
}

export async function selectUsersByIdsSql(
  db: DbExecutor,
  userIds: readonly string[],
): Promise<UserRow[]> {
  if (userIds.length === 0) return [];
  return db.selectFrom('users').selectAll().where('id', 'in', [...userIds]).execute();
}
