/**
 * src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring: the local store and the query router.
 * - The sync module consumes `userStore`; the CLI consumes `userService`.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { Db } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { UsersApi } from '../okta';

import { SqlUserStore } from './store/sql-user.store';
import type { UserStore } from './store/user.store';
import { Tombstones } from './store/user.store';
import { UserService } from './user.service';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  db: Db;
  remote: UsersApi;
  logger: Logger;
  tombstones?: Tombstones;
}) {
  const userStore: UserStore = new SqlUserStore({
    db: deps.db,
    tombstones: deps.tombstones ?? new Tombstones(),
    logger: deps.logger,
  });

  const userService = new UserService({
    store: userStore,
    remote: deps.remote,
    logger: deps.logger,
  });

  return {
    userStore,
    userService,
  };
}
