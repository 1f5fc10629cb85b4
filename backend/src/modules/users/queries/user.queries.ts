/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * RULES:
 * - Read-only. No AppError.
 * - Rows with a role outside the known set are treated as missing.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { isRole } from '../../access';
import type { UserAccount } from '../user.types';
import { selectUserByIdSql, selectUsersByIdsSql, type UserRow } from '../dal/user.query-sql';

export function toUserAccount(row: UserRow): UserAccount | undefined {
  if (!isRole(row.role)) return undefined;

  return {
    id: row.id,
    schoolId: row.school_id,
    role: row.role,
    displayName: row.display_name,
    email: row.email,
    createdAt: row.created_at,
  };
}

export async function getUserById(db: DbExecutor, userId: string): Promise<UserAccount | undefined> {
  const row = await selectUserByIdSql(db, userId);
  return row ? toUserAccount(row) : undefined;
}

export async function getUsersByIds(
  db: DbExecutor,
  userIds: readonly string[],
): Promise<UserAccount[]> {
  const rows = await selectUsersByIdsSql(db, userIds);
  return rows.flatMap((row) => toUserAccount(row) ?? []);
}
