/**
 * backend/src/modules/users/index.ts
 *
 * Public surface of the users module (support module, no routes).
 */

export type { UserAccount, UserId } from './user.types';
export type { UserDirectory } from './store/user.directory';
export { KyselyUserDirectory } from './store/kysely-user.directory';
export { InMemUserDirectory } from './store/inmem-user.directory';
