/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for one CLI invocation.
 * - Creates infra clients ONCE (db, Okta client) and shares them safely.
 * - Keeps modules testable (tests inject a fake UsersApi and an in-memory db).
 *
 * RULES:
 * - No business logic here.
 * - No CLI parsing here.
 * - Environment-dependent decisions (configured vs unconfigured remote, sqlite vs
 *   postgres) belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';

import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';
import { migrateToLatest } from '../shared/db/migrate';

import { createLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { OktaUsersClient, unconfiguredUsersApi } from '../modules/okta';
import type { UsersApi } from '../modules/okta';

import { createUserModule } from '../modules/users';
import type { UserModule } from '../modules/users';

import { createSyncModule } from '../modules/sync';
import type { SyncModule } from '../modules/sync';

export type AppDeps = {
  config: AppConfig;
  db: Db;
  logger: Logger;
  remote: UsersApi;

  // modules
  users: UserModule;
  sync: SyncModule;

  // lifecycle
  close: () => Promise<void>;
};

export type BuildDepsOverrides = {
  logger?: Logger;
  /** Replaces the Okta client entirely (tests). */
  remote?: UsersApi;
  fetchFn?: typeof fetch;
};

export function buildLogger(config: AppConfig): Logger {
  return createLogger({
    level: config.logLevel,
    service: config.serviceName,
    env: config.nodeEnv,
    file: config.logFile,
    silent: config.nodeEnv === 'test',
  });
}

function buildRemote(config: AppConfig, logger: Logger, fetchFn?: typeof fetch): UsersApi {
  // local-only commands still work without credentials
  if (!config.okta) return unconfiguredUsersApi();

  return new OktaUsersClient({
    orgUrl: config.okta.orgUrl,
    apiToken: config.okta.apiToken,
    timeoutSeconds: config.requestTimeoutSeconds,
    pageSize: config.syncPageSize,
    fetchFn,
    logger,
  });
}

export async function buildDeps(
  config: AppConfig,
  overrides: BuildDepsOverrides = {},
): Promise<AppDeps> {
  const logger = overrides.logger ?? buildLogger(config);

  const db = createDb(config.databaseUrl, { poolSize: config.syncConcurrency });
  try {
    await migrateToLatest(db, logger);
  } catch (err) {
    await db.destroy();
    throw err;
  }

  const remote = overrides.remote ?? buildRemote(config, logger, overrides.fetchFn);

  // modules (no CLI / no business logic here)
  const users = createUserModule({ db, remote, logger });
  const sync = createSyncModule({
    remote,
    store: users.userStore,
    logger,
    options: { concurrency: config.syncConcurrency },
  });

  return {
    config,
    db,
    logger,
    remote,
    users,
    sync,
    close: async () => {
      await db.destroy();
    },
  };
}
