import type { DbExecutor } from '../../../shared/db/db';
import type { UserAccount } from '../user.types';
import type { UserDirectory } from './user.directory';
import { getUserById, getUsersByIds } from '../queries/user.queries';

export class KyselyUserDirectory implements UserDirectory {
  constructor(private readonly db: DbExecutor) {}

  getUser(userId: string): Promise<UserAccount | undefined> {
    return getUserById(this.db, userId);
  }

  getUsers(userIds: readonly string[]): Promise<UserAccount[]> {
    return getUsersByIds(this.db, [...new Set(userIds)]);
  }
}
