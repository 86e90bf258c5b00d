/**
 * src/modules/sync/sync.types.ts
 *
 * WHY:
 * - Shapes the sync engine hands to the CLI: progress events and the run summary.
 *
 * RULES:
 * - A SyncSummary is only ever returned complete (possibly `cancelled`);
 *   aborted runs surface a single AppError instead.
 */

import type { RecordValidationError, UpsertOutcome } from '../users';

export type SyncEngineOptions = {
  /** Hard upper bound on in-flight upserts. */
  concurrency: number;
  /** Total attempts per record before it is recorded as failed. */
  upsertAttempts: number;
  upsertBaseDelayMs: number;
};

export type SyncProgress = {
  /** 1-based page number whose records all settled. */
  page: number;
  /** Records settled so far (upserted, unchanged, skipped or failed). */
  processed: number;
  /** Records seen so far; the remote total is not known up front. */
  knownTotal: number;
};

export type SyncRunOptions = {
  signal?: AbortSignal;
  onProgress?: (progress: SyncProgress) => void;
  /** Resume from a page cursor instead of the start of the collection. */
  cursor?: string;
};

export type FailedRecord = {
  id: string;
  reason: string;
  attempts: number;
};

export type SyncSummary = {
  /** inserted + updated */
  upserted: number;
  /** unchanged + stale + deleted (no write) */
  unchanged: number;
  skipped: number;
  failed: number;

  outcomes: Record<UpsertOutcome, number>;
  skippedRecords: RecordValidationError[];
  failures: FailedRecord[];

  pages: number;
  processed: number;
  knownTotal: number;
  cancelled: boolean;

  peakConcurrency: number;
  durationMs: number;
};
