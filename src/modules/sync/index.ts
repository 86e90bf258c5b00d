/**
 * src/modules/sync/index.ts
 *
 * Public surface of the sync module.
 */

export { SyncEngine, DEFAULT_SYNC_OPTIONS } from './sync.engine';
export { createSyncModule } from './sync.module';
export type { SyncModule } from './sync.module';
export { SyncErrors } from './sync.errors';
export type {
  FailedRecord,
  SyncEngineOptions,
  SyncProgress,
  SyncRunOptions,
  SyncSummary,
} from './sync.types';
