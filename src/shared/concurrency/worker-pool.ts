/**
 * src/shared/concurrency/worker-pool.ts
 *
 * WHY:
 * - Caps the number of in-flight tasks (e.g. store upserts) at a fixed size.
 * - `submit()` only resolves once a worker slot is free, so a producer that
 *   awaits it is held back while the pool is saturated (backpressure).
 *   Work never piles up unboundedly in memory.
 *
 * HOW TO USE:
 * - const pool = new WorkerPool({ concurrency: 8 })
 * - const { done } = await pool.submit(() => doWork())   // resolves when the task STARTS
 * - await done                                          // resolves when that task settled
 * - await pool.onIdle()                                 // resolves when every task has settled
 *
 * RULES:
 * - Tasks own their error handling. A rejection that escapes a task is handed
 *   to `onTaskError`; it never rejects `submit()`, `done` or `onIdle()`.
 * - stats().peak is the instrumentation hook for the concurrency bound.
 */

import os from 'node:os';

export type WorkerPoolOptions = {
  concurrency: number;
  onTaskError?: (err: unknown) => void;
};

export type SubmittedTask = {
  done: Promise<void>;
};

export type WorkerPoolStats = {
  active: number;
  waiting: number;
  peak: number;
  completed: number;
};

/** min(8, cores * 2): enough to overlap store I/O without flooding one storage handle. */
export function defaultConcurrency(): number {
  return Math.min(8, os.availableParallelism() * 2);
}

export class WorkerPool {
  private active = 0;
  private peak = 0;
  private completed = 0;
  private readonly slotWaiters: Array<() => void> = [];
  private readonly idleWaiters: Array<() => void> = [];

  constructor(private readonly opts: WorkerPoolOptions) {
    if (!Number.isInteger(opts.concurrency) || opts.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${opts.concurrency}`);
    }
  }

  async submit(task: () => Promise<void>): Promise<SubmittedTask> {
    while (this.active >= this.opts.concurrency) {
      await new Promise<void>((resolve) => this.slotWaiters.push(resolve));
    }

    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
    return { done: this.execute(task) };
  }

  onIdle(): Promise<void> {
    if (this.active === 0 && this.slotWaiters.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  stats(): WorkerPoolStats {
    return {
      active: this.active,
      waiting: this.slotWaiters.length,
      peak: this.peak,
      completed: this.completed,
    };
  }

  private async execute(task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (err) {
      this.opts.onTaskError?.(err);
    } finally {
      this.active -= 1;
      this.completed += 1;
      this.release();
    }
  }

  private release(): void {
    const next = this.slotWaiters.shift();
    if (next) {
      next();
      return;
    }

    if (this.active === 0) {
      const waiters = this.idleWaiters.splice(0, this.idleWaiters.length);
      for (const resolve of waiters) resolve();
    }
  }
}
