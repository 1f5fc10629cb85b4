/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Accounts are provisioned by the school's identity provider. This service
 *   only reads them: who is a student, who is staff, what to call them.
 */

import type { Role } from '../access';

export type UserId = string;

export type UserAccount = Readonly<{
  id: UserId;
  schoolId: string;
  role: Role;
  displayName: string;
  email: string | null;
  createdAt: Date;
}>;
