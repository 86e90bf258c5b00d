import { describe, it, expect, vi } from 'vitest';

import { SyncEngine } from '../../../src/modules/sync';
import type { SyncEngineOptions, SyncProgress } from '../../../src/modules/sync';
import { InMemUserStore, Tombstones, mapRecord } from '../../../src/modules/users';
import type { UserRecord, UserStore } from '../../../src/modules/users';
import { AppError } from '../../../src/shared/errors/errors';
import { FakeUsersApi } from '../../helpers/fake-users-api';
import { FlakyStore } from '../../helpers/flaky-store';
import { rawUser, rawUsers } from '../../helpers/raw-user';
import { silentLogger } from '../../helpers/test-db';

function engine(remote: FakeUsersApi, store: UserStore, options: Partial<SyncEngineOptions> = {}) {
  return new SyncEngine({
    remote,
    store,
    logger: silentLogger(),
    options: { concurrency: 4, upsertBaseDelayMs: 1, ...options },
  });
}

/** 3 pages x 2 users; u4 carries an invalid email. */
function threePages() {
  return new FakeUsersApi([
    [rawUser({ id: 'u1' }), rawUser({ id: 'u2' })],
    [rawUser({ id: 'u3' }), rawUser({ id: 'u4', profile: { email: 'not-an-email' } })],
    [rawUser({ id: 'u5' }), rawUser({ id: 'u6' })],
  ]);
}

describe('SyncEngine', () => {
  it('upserts every valid record and skips invalid ones', async () => {
    const remote = threePages();
    const store = new InMemUserStore();
    const progress: SyncProgress[] = [];

    const summary = await engine(remote, store).run({ onProgress: (p) => progress.push(p) });

    expect(summary).toMatchObject({
      upserted: 5,
      unchanged: 0,
      skipped: 1,
      failed: 0,
      pages: 3,
      processed: 6,
      knownTotal: 6,
      cancelled: false,
      skippedRecords: [{ id: 'u4', reason: 'profile.email: Invalid email' }],
      failures: [],
    });
    expect(store.snapshot().map((r) => r.user.id)).toEqual(['u1', 'u2', 'u3', 'u5', 'u6']);
    expect(progress.map((p) => p.page).sort()).toEqual([1, 2, 3]);
    expect(remote.listCalls).toEqual([undefined, 'cursor-2', 'cursor-3']);
  });

  it('stores exactly what the mapper produces', async () => {
    const store = new InMemUserStore();
    await engine(threePages(), store).run();

    const mapped = mapRecord(rawUser({ id: 'u1' }));
    expect(mapped.ok && (await store.getById('u1'))).toEqual(mapped.ok && mapped.record);
  });

  it('is idempotent: a second run over unchanged data writes nothing', async () => {
    const remote = threePages();
    const store = new InMemUserStore();

    await engine(remote, store).run();
    const second = await engine(remote, store).run();

    expect(second).toMatchObject({ upserted: 0, unchanged: 5, skipped: 1, failed: 0 });
    expect(second.outcomes).toEqual({ inserted: 0, updated: 0, unchanged: 5, stale: 0, deleted: 0 });
  });

  it('applies newer remote versions and ignores older ones', async () => {
    const store = new InMemUserStore();
    await engine(new FakeUsersApi([[rawUser({ id: 'u1' }), rawUser({ id: 'u2' })]]), store).run();

    const summary = await engine(
      new FakeUsersApi([
        [
          rawUser({ id: 'u1', lastUpdated: '2024-03-01T00:00:00.000Z', profile: { firstName: 'Newer' } }),
          rawUser({ id: 'u2', lastUpdated: '2023-12-01T00:00:00.000Z', profile: { firstName: 'Older' } }),
        ],
      ]),
      store,
    ).run();

    expect(summary.outcomes).toMatchObject({ updated: 1, stale: 1 });
    expect((await store.getById('u1'))?.profile.firstName).toBe('Newer');
    expect((await store.getById('u2'))?.profile.firstName).toBe('Test');
  });

  it('is additive: local users missing remotely are kept', async () => {
    const store = new InMemUserStore();
    const ghost = mapRecord(rawUser({ id: 'ghost' }));
    if (ghost.ok) await store.upsert(ghost.record);

    await engine(threePages(), store).run();

    expect(await store.getById('ghost')).toBeDefined();
    expect(store.size).toBe(6);
  });

  it('never runs more upserts at once than the concurrency bound', async () => {
    const remote = new FakeUsersApi([rawUsers(10, 'a'), rawUsers(10, 'b'), rawUsers(10, 'c')]);
    const store = new FlakyStore({ latencyMs: 2 });

    const summary = await engine(remote, store, { concurrency: 3 }).run();

    expect(summary.upserted).toBe(30);
    expect(store.maxInFlight).toBe(3);
    expect(summary.peakConcurrency).toBe(3);
  });

  it('runs strictly one upsert at a time with concurrency 1', async () => {
    const store = new FlakyStore({ latencyMs: 1 });

    const summary = await engine(new FakeUsersApi([rawUsers(5)]), store, { concurrency: 1 }).run();

    expect(summary.upserted).toBe(5);
    expect(store.maxInFlight).toBe(1);
  });

  it('isolates one bad record among nine good ones', async () => {
    const page = [...rawUsers(9), rawUser({ id: 'bad', status: 'ARCHIVED' })];

    const summary = await engine(new FakeUsersApi([page]), new InMemUserStore()).run();

    expect(summary).toMatchObject({ upserted: 9, skipped: 1, failed: 0 });
    expect(summary.skippedRecords[0].id).toBe('bad');
  });

  it('retries store failures before recording them', async () => {
    const logger = silentLogger();
    const errorSpy = vi.spyOn(logger, 'error');
    const store = new FlakyStore({ failures: { u2: 2, u3: Infinity } });

    const summary = await new SyncEngine({
      remote: new FakeUsersApi([rawUsers(4)]),
      store,
      logger,
      options: { concurrency: 2, upsertAttempts: 3, upsertBaseDelayMs: 1 },
    }).run();

    expect(summary).toMatchObject({ upserted: 3, failed: 1, processed: 4 });
    expect(summary.failures).toEqual([{ id: 'u3', reason: 'disk I/O error', attempts: 3 }]);
    expect(store.attemptsById.get('u2')).toBe(3);
    expect(store.attemptsById.get('u3')).toBe(3);
    expect(errorSpy).toHaveBeenCalledWith(
      'sync.record.failed',
      expect.objectContaining({ userId: 'u3', attempts: 3 }),
    );
  });

  it('aborts the run on a fatal page error after in-flight upserts settle', async () => {
    const remote = threePages();
    remote.listErrors.set(2, AppError.fatal('Invalid token provided'));
    const store = new FlakyStore({ latencyMs: 5 });

    await expect(engine(remote, store).run()).rejects.toMatchObject({
      code: 'FATAL',
      message: 'Invalid token provided',
    });
    expect(store.inFlight).toBe(0);
    expect(store.inner.size).toBe(2);
  });

  it('wraps unexpected page errors as INTERNAL', async () => {
    const remote = threePages();
    remote.listErrors.set(1, new Error('socket hang up'));

    await expect(engine(remote, new InMemUserStore()).run()).rejects.toMatchObject({
      code: 'INTERNAL',
      message: 'Sync aborted: socket hang up',
    });
  });

  it('returns a partial summary when cancelled between pages', async () => {
    const remote = threePages();
    const controller = new AbortController();
    remote.beforePage = (page) => {
      if (page === 2) controller.abort();
    };
    const store = new InMemUserStore();

    const summary = await engine(remote, store).run({ signal: controller.signal });

    expect(summary).toMatchObject({ cancelled: true, upserted: 2, pages: 2, processed: 2, knownTotal: 4 });
    expect(remote.listCalls).toHaveLength(2);
    expect(store.size).toBe(2);
  });

  it('stops dispatching mid-page and waits for in-flight upserts when cancelled', async () => {
    const controller = new AbortController();
    class AbortOnThird extends FlakyStore {
      override upsert(record: UserRecord) {
        if (record.user.id === 'u3') controller.abort();
        return super.upsert(record);
      }
    }
    const store = new AbortOnThird({ latencyMs: 10 });

    const summary = await engine(new FakeUsersApi([rawUsers(10)]), store, { concurrency: 2 }).run({
      signal: controller.signal,
    });

    expect(summary).toMatchObject({ cancelled: true, pages: 1, knownTotal: 10, upserted: 3, processed: 3, failed: 0 });
    expect(store.inFlight).toBe(0);
    expect(store.inner.size).toBe(3);
  });

  it('treats a request cancelled by the abort as cancellation, not failure', async () => {
    const remote = threePages();
    const controller = new AbortController();
    remote.beforePage = (page) => {
      if (page === 2) controller.abort();
    };
    remote.listErrors.set(2, AppError.cancelled('Request cancelled'));

    const summary = await engine(remote, new InMemUserStore()).run({ signal: controller.signal });

    expect(summary).toMatchObject({ cancelled: true, upserted: 2, pages: 1 });
  });

  it('does not resurrect a user deleted before its stale version arrives', async () => {
    const tombstones = new Tombstones();
    const store = new InMemUserStore({ tombstones });
    await store.delete('u1');

    const summary = await engine(
      new FakeUsersApi([[rawUser({ id: 'u1' }), rawUser({ id: 'u2' })]]),
      store,
    ).run();

    expect(summary.outcomes).toMatchObject({ deleted: 1, inserted: 1 });
    expect(summary.unchanged).toBe(1);
    expect(await store.getById('u1')).toBeUndefined();
  });
});
