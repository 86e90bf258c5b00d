/**
 * src/modules/sync/sync.engine.ts
 *
 * WHY:
 * - Mirrors the whole remote user collection into the local store in one pass.
 * - Page fetches are sequential (each cursor comes from the previous page);
 *   upserts run in a bounded WorkerPool.
 *
 * FLOW (per page):
 * 1) fetch page (client retries transient / rate-limited failures internally)
 * 2) map every record; invalid ones are skipped with a reason
 * 3) submit valid records to the pool; submit() blocks while the pool is full
 * 4) each upsert retries store failures with exponential backoff, then fails
 * 5) once every record of the page settled, report progress
 *
 * FAILURE SEMANTICS:
 * - Record-level problems (validation, store errors) end up in the summary.
 * - A page fetch failure or FATAL remote error aborts the run, after in-flight
 *   upserts have settled, as a single AppError.
 * - Cancellation stops fetching and dispatching, lets in-flight upserts finish,
 *   and returns the partial summary with `cancelled: true`.
 *
 * RULES:
 * - Additive only: rows absent from the remote pass are never deleted here.
 * - No ordering guarantee between records; convergence comes from the store's
 *   updatedAt tie-break.
 */

import type { Logger } from '../../shared/logger/logger';
import { errorMessage, isAppError } from '../../shared/errors/errors';
import { withRetry } from '../../shared/concurrency/retry';
import { WorkerPool, defaultConcurrency } from '../../shared/concurrency/worker-pool';
import { iterateUserPages } from '../okta';
import type { UsersApi } from '../okta';
import { mapRecord } from '../users';
import type { RecordValidationError, UpsertOutcome, UserRecord, UserStore } from '../users';

import { SyncErrors } from './sync.errors';
import type {
  FailedRecord,
  SyncEngineOptions,
  SyncProgress,
  SyncRunOptions,
  SyncSummary,
} from './sync.types';

export const DEFAULT_SYNC_OPTIONS: SyncEngineOptions = {
  concurrency: defaultConcurrency(),
  upsertAttempts: 3,
  upsertBaseDelayMs: 100,
};

/** Mutable counters for one run; frozen into a SyncSummary at the end. */
class SyncTally {
  readonly outcomes: Record<UpsertOutcome, number> = {
    inserted: 0,
    updated: 0,
    unchanged: 0,
    stale: 0,
    deleted: 0,
  };
  readonly skippedRecords: RecordValidationError[] = [];
  readonly failures: FailedRecord[] = [];
  pages = 0;
  knownTotal = 0;
  processed = 0;

  record(outcome: UpsertOutcome): void {
    this.outcomes[outcome] += 1;
    this.processed += 1;
  }

  skip(error: RecordValidationError): void {
    this.skippedRecords.push(error);
    this.processed += 1;
  }

  fail(failure: FailedRecord): void {
    this.failures.push(failure);
    this.processed += 1;
  }

  toSummary(extra: { cancelled: boolean; peakConcurrency: number; durationMs: number }): SyncSummary {
    const o = this.outcomes;
    return {
      upserted: o.inserted + o.updated,
      unchanged: o.unchanged + o.stale + o.deleted,
      skipped: this.skippedRecords.length,
      failed: this.failures.length,
      outcomes: { ...o },
      skippedRecords: [...this.skippedRecords],
      failures: [...this.failures],
      pages: this.pages,
      processed: this.processed,
      knownTotal: this.knownTotal,
      ...extra,
    };
  }
}

export class SyncEngine {
  private readonly options: SyncEngineOptions;

  constructor(
    private readonly deps: {
      remote: UsersApi;
      store: UserStore;
      logger: Logger;
      options?: Partial<SyncEngineOptions>;
      now?: () => number;
    },
  ) {
    this.options = { ...DEFAULT_SYNC_OPTIONS, ...deps.options };
  }

  async run(opts: SyncRunOptions = {}): Promise<SyncSummary> {
    const now = this.deps.now ?? Date.now;
    const startedAt = now();
    const { logger } = this.deps;
    const { signal } = opts;

    const tally = new SyncTally();
    const pool = new WorkerPool({
      concurrency: this.options.concurrency,
      onTaskError: (err) => logger.error('sync.worker.crashed', { err }),
    });
    const pagesSettled: Promise<void>[] = [];
    let fetchError: unknown;

    logger.info('sync.run.start', {
      concurrency: this.options.concurrency,
      cursor: opts.cursor ?? null,
    });

    try {
      for await (const page of iterateUserPages(this.deps.remote, { cursor: opts.cursor, signal })) {
        tally.pages += 1;
        tally.knownTotal += page.records.length;

        logger.info('sync.page.fetched', {
          page: page.page,
          count: page.records.length,
          hasNext: page.nextCursor !== undefined,
        });

        const recordsSettled: Promise<void>[] = [];

        for (const raw of page.records) {
          if (signal?.aborted) break;

          const mapped = mapRecord(raw);
          if (!mapped.ok) {
            tally.skip(mapped.error);
            logger.warn('sync.record.skipped', { userId: mapped.error.id, reason: mapped.error.reason });
            continue;
          }

          const { done } = await pool.submit(() => this.upsertOne(mapped.record, tally, signal));
          recordsSettled.push(done);
        }

        pagesSettled.push(
          Promise.all(recordsSettled).then(() => this.reportProgress(opts, tally, page.page)),
        );

        if (signal?.aborted) break;
      }
    } catch (err) {
      fetchError = err;
    }

    // never hand back (or throw) while upserts are still writing
    await pool.onIdle();
    await Promise.all(pagesSettled);

    const cancelled = signal?.aborted ?? false;

    if (fetchError !== undefined && !(cancelled && isAppError(fetchError) && fetchError.code === 'CANCELLED')) {
      logger.error('sync.run.aborted', {
        err: fetchError,
        pages: tally.pages,
        processed: tally.processed,
      });
      throw SyncErrors.runAborted(fetchError, { pages: tally.pages });
    }

    const summary = tally.toSummary({
      cancelled,
      peakConcurrency: pool.stats().peak,
      durationMs: now() - startedAt,
    });

    logger.info(cancelled ? 'sync.run.cancelled' : 'sync.run.done', {
      upserted: summary.upserted,
      unchanged: summary.unchanged,
      skipped: summary.skipped,
      failed: summary.failed,
      pages: summary.pages,
      durationMs: summary.durationMs,
    });

    return summary;
  }

  private async upsertOne(record: UserRecord, tally: SyncTally, signal?: AbortSignal): Promise<void> {
    const userId = record.user.id;
    let attempts = 0;

    try {
      const outcome = await withRetry(
        (attempt) => {
          attempts = attempt;
          return this.deps.store.upsert(record);
        },
        {
          attempts: this.options.upsertAttempts,
          baseDelayMs: this.options.upsertBaseDelayMs,
          signal,
          onRetry: (err, attempt, delayMs) =>
            this.deps.logger.warn('sync.record.retry', { userId, attempt, delayMs, err }),
        },
      );

      tally.record(outcome);
      this.deps.logger.debug('sync.record.upserted', { userId, outcome });
    } catch (err) {
      tally.fail({ id: userId, reason: errorMessage(err), attempts });
      this.deps.logger.error('sync.record.failed', { userId, attempts, err });
    }
  }

  private reportProgress(opts: SyncRunOptions, tally: SyncTally, page: number): void {
    const progress: SyncProgress = {
      page,
      processed: tally.processed,
      knownTotal: tally.knownTotal,
    };

    this.deps.logger.debug('sync.progress', progress);

    try {
      opts.onProgress?.(progress);
    } catch (err) {
      this.deps.logger.warn('sync.progress.callback_failed', { page, err });
    }
  }
}
