/**
 * backend/src/modules/users/store/inmem-user.directory.ts
 *
 * WHY:
 * - Test stand-in for the users table. insertUser() is a fixture helper.
 */

import { randomUUID } from 'node:crypto';
import type { Role } from '../../access';
import type { UserAccount } from '../user.types';
import type { UserDirectory } from './user.directory';

export class InMemUserDirectory implements UserDirectory {
  private readonly users = new Map<string, UserAccount>();

  insertUser(input: {
    schoolId: string;
    role: Role;
    displayName: string;
    email?: string | null;
  }): UserAccount {
    const user: UserAccount = {
      id: randomUUID(),
      schoolId: input.schoolId,
      role: input.role,
      displayName: input.displayName,
      email: input.email ?? null,
      createdAt: new Date(),
    };
    this.users.set(user.id, user);
    return user;
  }

  getUser(userId: string): Promise<UserAccount | undefined> {
    return Promise.resolve(this.users.get(userId));
  }

  getUsers(userIds: readonly string[]): Promise<UserAccount[]> {
    const wanted = new Set(userIds);
    return Promise.resolve([...this.users.values()].filter((u) => wanted.has(u.id)));
  }
}
