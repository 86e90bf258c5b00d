/**
 * src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /dal, /queries or /store.
 *
 * RULES:
 * - Only export stable contracts needed by other modules and the CLI.
 */

export { mapRecord } from './user.mapper';
export type { MapResult, RecordValidationError } from './user.mapper';
export { UserService } from './user.service';
export type { DeleteUserResult, ListUsersResult, UpdateUserResult } from './user.service';
export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export type { UserStore } from './store/user.store';
export { Tombstones } from './store/user.store';
export { SqlUserStore } from './store/sql-user.store';
export { InMemUserStore } from './store/inmem-user.store';
export { UserSourceSchema, PagingSchema, UserSelectorSchema } from './user.schemas';
export { USER_SOURCES, USER_STATUSES } from './user.types';
export type {
  UpsertOutcome,
  User,
  UserPage,
  UserRecord,
  UserSelector,
  UserSource,
  UserStatus,
} from './user.types';
