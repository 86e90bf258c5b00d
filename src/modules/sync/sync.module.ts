/**
 * src/modules/sync/sync.module.ts
 *
 * WHY:
 * - Encapsulates Sync module wiring.
 * - An engine is built per run so a CLI `--concurrency` flag can override the
 *   configured bound without rebuilding the graph.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { Logger } from '../../shared/logger/logger';
import type { UsersApi } from '../okta';
import type { UserStore } from '../users';

import { SyncEngine } from './sync.engine';
import type { SyncEngineOptions } from './sync.types';

export type SyncModule = ReturnType<typeof createSyncModule>;

export function createSyncModule(deps: {
  remote: UsersApi;
  store: UserStore;
  logger: Logger;
  options?: Partial<SyncEngineOptions>;
}) {
  const createEngine = (overrides: Partial<SyncEngineOptions> = {}): SyncEngine =>
    new SyncEngine({
      remote: deps.remote,
      store: deps.store,
      logger: deps.logger,
      options: { ...deps.options, ...overrides },
    });

  return {
    createEngine,
  };
}
