import { describe, it, expect } from 'vitest';

import { InMemUserStore, Tombstones, mapRecord } from '../../../src/modules/users';
import type { UserRecord } from '../../../src/modules/users';
import { compareVersions } from '../../../src/modules/users/store/user.store';
import { rawUser } from '../../helpers/raw-user';
import type { RawUserOverrides } from '../../helpers/raw-user';

function record(overrides: RawUserOverrides = {}): UserRecord {
  const mapped = mapRecord(rawUser(overrides));
  if (!mapped.ok) throw new Error(mapped.error.reason);
  return mapped.record;
}

describe('compareVersions', () => {
  it('decides insert, unchanged, stale and update', () => {
    expect(compareVersions(undefined, '2024-01-01T00:00:00.000Z')).toBe('insert');
    expect(compareVersions('2024-01-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z')).toBe('unchanged');
    expect(compareVersions('2024-02-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z')).toBe('stale');
    expect(compareVersions('2024-01-01T00:00:00.000Z', '2024-02-01T00:00:00.000Z')).toBe('update');
  });
});

describe('InMemUserStore', () => {
  it('applies the same updatedAt tie-break as the SQL store', async () => {
    const store = new InMemUserStore();

    await expect(store.upsert(record({ id: 'u1' }))).resolves.toBe('inserted');
    await expect(store.upsert(record({ id: 'u1' }))).resolves.toBe('unchanged');
    await expect(
      store.upsert(record({ id: 'u1', lastUpdated: '2023-01-01T00:00:00.000Z' })),
    ).resolves.toBe('stale');
    await expect(
      store.upsert(record({ id: 'u1', lastUpdated: '2024-09-01T00:00:00.000Z', profile: { firstName: 'New' } })),
    ).resolves.toBe('updated');

    expect((await store.getById('u1'))?.profile.firstName).toBe('New');
  });

  it('re-indexes the email when a user changes it', async () => {
    const store = new InMemUserStore();
    await store.upsert(record({ id: 'u1', profile: { email: 'old@example.com' } }));
    await store.upsert(
      record({ id: 'u1', lastUpdated: '2024-09-01T00:00:00.000Z', profile: { email: 'New@Example.com' } }),
    );

    expect(await store.getByEmail('old@example.com')).toBeUndefined();
    expect((await store.getByEmail('new@example.com'))?.user.id).toBe('u1');
  });

  it('rejects an email owned by a user that is at least as new with CONFLICT', async () => {
    const store = new InMemUserStore();
    await store.upsert(record({ id: 'u1', profile: { email: 'shared@example.com' } }));

    await expect(
      store.upsert(record({ id: 'u2', profile: { email: 'shared@example.com' } })),
    ).rejects.toMatchObject({ code: 'CONFLICT', meta: { id: 'u2', email: 'shared@example.com', owner: 'u1' } });
    expect(store.size).toBe(1);
  });

  it('evicts an older holder of the email so a swap converges', async () => {
    const store = new InMemUserStore();
    await store.upsert(record({ id: 'a', profile: { email: 'x@example.com' } }));
    await store.upsert(record({ id: 'b', profile: { email: 'y@example.com' } }));

    const later = '2024-03-01T00:00:00.000Z';
    await expect(
      store.upsert(record({ id: 'a', lastUpdated: later, profile: { email: 'y@example.com' } })),
    ).resolves.toBe('updated');
    expect(await store.getById('b')).toBeUndefined();
    await expect(
      store.upsert(record({ id: 'b', lastUpdated: later, profile: { email: 'x@example.com' } })),
    ).resolves.toBe('inserted');

    expect((await store.getByEmail('x@example.com'))?.user.id).toBe('b');
    expect((await store.getByEmail('y@example.com'))?.user.id).toBe('a');
  });

  it('honours tombstones after delete', async () => {
    const store = new InMemUserStore({ tombstones: new Tombstones(() => new Date('2024-03-01T00:00:00.000Z')) });
    await store.upsert(record({ id: 'u1' }));

    await expect(store.delete('u1')).resolves.toBe(true);
    await expect(store.upsert(record({ id: 'u1' }))).resolves.toBe('deleted');
    await expect(
      store.upsert(record({ id: 'u1', lastUpdated: '2024-04-01T00:00:00.000Z' })),
    ).resolves.toBe('inserted');
  });

  it('lists pages in id order', async () => {
    const store = new InMemUserStore();
    for (const id of ['c', 'a', 'b']) await store.upsert(record({ id }));

    const page = await store.listPage(1, 5);

    expect(page.items.map((r) => r.user.id)).toEqual(['b', 'c']);
    expect(page).toMatchObject({ total: 3, offset: 1, limit: 5 });
  });
});
