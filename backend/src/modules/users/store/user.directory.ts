/**
 * backend/src/modules/users/store/user.directory.ts
 *
 * WHY:
 * - Read-only view of the accounts the identity provider created.
 */

import type { UserAccount } from '../user.types';

export interface UserDirectory {
  getUser(userId: string): Promise<UserAccount | undefined>;
  getUsers(userIds: readonly string[]): Promise<UserAccount[]>;
}
