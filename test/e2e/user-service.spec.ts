import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { UserService, createUserModule, mapRecord } from '../../src/modules/users';
import type { UserModule } from '../../src/modules/users';
import { SyncEngine } from '../../src/modules/sync';
import { AppError } from '../../src/shared/errors/errors';
import type { Logger } from '../../src/shared/logger/logger';
import { FakeUsersApi } from '../helpers/fake-users-api';
import { FlakyStore } from '../helpers/flaky-store';
import { rawUser } from '../helpers/raw-user';
import { createTestDb, silentLogger } from '../helpers/test-db';

describe('UserService against a migrated SQLite mirror', () => {
  let close: () => Promise<void>;
  let remote: FakeUsersApi;
  let logger: Logger;
  let users: UserModule;

  beforeEach(async () => {
    const testDb = await createTestDb();
    close = testDb.close;
    remote = new FakeUsersApi([[rawUser({ id: 'u1' }), rawUser({ id: 'u2' }), rawUser({ id: 'u3' })]]);
    logger = silentLogger();
    users = createUserModule({ db: testDb.db, remote, logger });
  });

  afterEach(async () => {
    await close();
  });

  async function syncAll() {
    return new SyncEngine({ remote, store: users.userStore, logger, options: { concurrency: 2 } }).run();
  }

  describe('get', () => {
    it('reports a user missing from the mirror as NOT_FOUND', async () => {
      await expect(users.userService.get({ id: 'u1' }, 'local')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'User not found',
      });
    });

    it('reads local users by id and by email', async () => {
      await syncAll();

      expect((await users.userService.get({ id: 'u2' }, 'local')).profile.email).toBe('u2@example.com');
      expect((await users.userService.get({ email: 'U3@EXAMPLE.COM' }, 'local')).user.id).toBe('u3');
    });

    it('writes remote reads back into the mirror', async () => {
      const record = await users.userService.get({ id: 'u1' }, 'remote');

      expect(record.user.id).toBe('u1');
      expect(await users.userStore.getById('u1')).toEqual(record);
      expect(remote.calls).toEqual([{ method: 'getUserById', id: 'u1' }]);
    });

    it('looks remote users up by email', async () => {
      const record = await users.userService.get({ email: 'u2@example.com' }, 'remote');

      expect(record.user.id).toBe('u2');
    });

    it('rejects invalid remote records', async () => {
      remote.users.set('bad', rawUser({ id: 'bad', profile: { email: 'nope' } }));

      await expect(users.userService.get({ id: 'bad' }, 'remote')).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'Remote user record is invalid: profile.email: Invalid email',
      });
    });

    it('logs a failed write-back without failing the read', async () => {
      const store = new FlakyStore({ failures: { u1: Infinity } });
      const warn = vi.spyOn(logger, 'warn');
      const service = new UserService({ store, remote, logger });

      const record = await service.get({ id: 'u1' }, 'remote');

      expect(record.user.id).toBe('u1');
      expect(warn).toHaveBeenCalledWith(
        'users.write_back.failed',
        expect.objectContaining({ userId: 'u1' }),
      );
    });
  });

  describe('update', () => {
    it('updates remotely first and mirrors the result', async () => {
      await syncAll();

      const result = await users.userService.update('u1', { firstName: 'Ada' });

      expect(result.localOutcome).toBe('updated');
      expect(result.record.profile.firstName).toBe('Ada');
      expect((await users.userStore.getById('u1'))?.profile.firstName).toBe('Ada');
      expect(remote.calls).toEqual([{ method: 'updateUserProfile', id: 'u1' }]);
    });

    it('updates the org profile attributes', async () => {
      await syncAll();

      await users.userService.update('u1', { secondEmail: 'test.private@example.org', ackNewBusiness: 1 });

      expect((await users.userStore.getById('u1'))?.profile).toMatchObject({
        secondEmail: 'test.private@example.org',
        ackNewBusiness: 1,
        placementOrg: null,
      });
    });

    it('rejects a malformed secondEmail before calling the remote', async () => {
      await expect(users.userService.update('u1', { secondEmail: 'not-an-email' })).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'Invalid profile update: Invalid email',
      });
      expect(remote.calls).toEqual([]);
    });

    it('rejects an empty update before calling the remote', async () => {
      await expect(users.userService.update('u1', {})).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'Invalid profile update: at least one profile field is required',
      });
      expect(remote.calls).toEqual([]);
    });

    it('rejects unknown profile keys', async () => {
      await expect(users.userService.update('u1', { nickname: 'ada' })).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
      });
      expect(remote.calls).toEqual([]);
    });

    it('leaves the mirror untouched when the remote rejects the update', async () => {
      await syncAll();
      remote.errors.set('updateUserProfile', AppError.validationError('Api validation failed: login'));

      await expect(users.userService.update('u1', { login: 'taken' })).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
      });
      expect((await users.userStore.getById('u1'))?.profile.login).toBe('u1@example.com');
    });
  });

  describe('delete', () => {
    it('keeps the local copy when the remote denies the deletion', async () => {
      await syncAll();
      remote.errors.set('deleteUser', AppError.fatal('You do not have permission to perform the requested action'));

      await expect(users.userService.delete({ id: 'u1' })).rejects.toMatchObject({ code: 'FATAL' });
      expect(await users.userStore.getById('u1')).toBeDefined();
    });

    it('deletes remotely, then locally, resolving an email to an id', async () => {
      await syncAll();

      await expect(users.userService.delete({ email: 'U1@example.com' })).resolves.toEqual({
        id: 'u1',
        removedLocally: true,
      });
      expect(await users.userStore.getById('u1')).toBeUndefined();
      expect(remote.users.has('u1')).toBe(false);
    });

    it('purges the local copy when the user is already gone remotely', async () => {
      const ghost = mapRecord(rawUser({ id: 'ghost' }));
      if (ghost.ok) await users.userStore.upsert(ghost.record);

      await expect(users.userService.delete({ id: 'ghost' })).rejects.toMatchObject({ code: 'NOT_FOUND' });
      expect(await users.userStore.getById('ghost')).toBeUndefined();
    });

    it('is not resurrected by a sync that saw the old version', async () => {
      await syncAll();
      await users.userService.delete({ id: 'u2' });

      // the remote listing still carries u2 (eventual consistency)
      const summary = await new SyncEngine({
        remote: new FakeUsersApi([[rawUser({ id: 'u2' })]]),
        store: users.userStore,
        logger,
      }).run();

      expect(summary.outcomes.deleted).toBe(1);
      expect(await users.userStore.getById('u2')).toBeUndefined();
    });
  });

  describe('sync', () => {
    it('converges after two users swap emails remotely', async () => {
      await syncAll();
      const swapped = new FakeUsersApi([
        [
          rawUser({ id: 'u1', lastUpdated: '2024-03-01T00:00:00.000Z', profile: { email: 'u2@example.com' } }),
          rawUser({ id: 'u2', lastUpdated: '2024-03-01T00:00:00.000Z', profile: { email: 'u1@example.com' } }),
        ],
      ]);
      const resync = () => new SyncEngine({ remote: swapped, store: users.userStore, logger }).run();

      const first = await resync();
      const second = await resync();

      expect(first).toMatchObject({ upserted: 2, failed: 0 });
      expect(second).toMatchObject({ upserted: 0, unchanged: 2, failed: 0 });
      expect((await users.userStore.getByEmail('u2@example.com'))?.user.id).toBe('u1');
      expect((await users.userStore.getByEmail('u1@example.com'))?.user.id).toBe('u2');
    });
  });

  describe('list', () => {
    it('returns one page with the total', async () => {
      await syncAll();

      const page = await users.userService.list(2, 2);

      expect(page).toMatchObject({ page: 2, total: 3, offset: 2, limit: 2 });
      expect(page.items.map((r) => r.user.id)).toEqual(['u3']);
    });

    it('rejects non-positive paging', async () => {
      await expect(users.userService.list(0, 20)).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
    });
  });

  it('forwards password resets to the remote', async () => {
    await expect(users.userService.resetPassword('u1', { sendEmail: false })).resolves.toEqual({
      summary: 'reset_password',
      resetPasswordUrl: 'https://example.okta.com/reset/u1',
    });
  });
});
