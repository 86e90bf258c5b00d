/**
 * src/shared/concurrency/retry.ts
 *
 * WHY:
 * - One bounded retry loop shared by the HTTP client (page fetches) and the
 *   sync engine (per-record upserts).
 *
 * RULES:
 * - Attempts are bounded; the last error is rethrown unchanged.
 * - `shouldRetry` decides per error; non-retryable errors surface immediately.
 * - `delayFor` may override the backoff (e.g. a server-provided Retry-After).
 * - Aborting `signal` stops scheduling further attempts.
 */

import { sleep } from './sleep';

export type RetryOptions = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  /** Return a delay in ms to override exponential backoff for this error. */
  delayFor?: (err: unknown, attempt: number) => number | undefined;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
};

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = 30_000): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  let attempt = 1;

  for (;;) {
    try {
      return await fn(attempt);
    } catch (err) {
      const canRetry =
        attempt < opts.attempts &&
        !opts.signal?.aborted &&
        (opts.shouldRetry ? opts.shouldRetry(err, attempt) : true);

      if (!canRetry) throw err;

      const delayMs =
        opts.delayFor?.(err, attempt) ?? backoffDelay(attempt, opts.baseDelayMs, opts.maxDelayMs);

      opts.onRetry?.(err, attempt, delayMs);
      await sleep(delayMs, opts.signal);

      if (opts.signal?.aborted) throw err;
      attempt += 1;
    }
  }
}
