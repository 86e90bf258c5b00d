/**
 * src/modules/users/store/inmem-user.store.ts
 *
 * WHY:
 * - UserStore without a database, for tests and for exercising the sync engine
 *   in isolation. Same contract as SqlUserStore (tie-break, tombstones,
 *   case-insensitive unique email, atomic per record).
 *
 * HOW TO USE:
 * - const store = new InMemUserStore()
 * - snapshot() returns a deep copy of every stored record, sorted by id.
 *
 * RULES:
 * - Each operation mutates the maps synchronously after its checks, so a record
 *   is never observable half-written (JavaScript runs it to completion).
 */

import { UserErrors } from '../user.errors';
import type { UpsertOutcome, UserPage, UserRecord } from '../user.types';

import { Tombstones, compareVersions } from './user.store';
import type { UserStore } from './user.store';

function clone(record: UserRecord): UserRecord {
  return {
    user: { ...record.user },
    profile: { ...record.profile },
    type: { ...record.type },
  };
}

export class InMemUserStore implements UserStore {
  private readonly records = new Map<string, UserRecord>();
  private readonly idsByEmail = new Map<string, string>();
  private readonly typeNames = new Map<string, string | null>();
  private readonly tombstones: Tombstones;

  constructor(opts: { tombstones?: Tombstones } = {}) {
    this.tombstones = opts.tombstones ?? new Tombstones();
  }

  getById(id: string): Promise<UserRecord | undefined> {
    const record = this.records.get(id);
    return Promise.resolve(record ? this.withTypeName(record) : undefined);
  }

  getByEmail(email: string): Promise<UserRecord | undefined> {
    const id = this.idsByEmail.get(email.trim().toLowerCase());
    if (id === undefined) return Promise.resolve(undefined);
    return this.getById(id);
  }

  listPage(offset: number, limit: number): Promise<UserPage> {
    const all = this.snapshot();
    const items = all.slice(offset, offset + limit);

    return Promise.resolve({ items, total: all.length, offset, limit });
  }

  upsert(record: UserRecord): Promise<UpsertOutcome> {
    const id = record.user.id;
    if (this.tombstones.suppresses(id, record.user.updatedAt)) return Promise.resolve('deleted');

    const decision = compareVersions(this.records.get(id)?.user.updatedAt, record.user.updatedAt);
    if (decision === 'unchanged' || decision === 'stale') return Promise.resolve(decision);

    const email = record.profile.email.toLowerCase();
    const holder = this.emailHolder(email, id);
    if (holder && holder.user.updatedAt >= record.user.updatedAt) {
      return Promise.reject(UserErrors.emailTaken({ id, email, owner: holder.user.id }));
    }
    if (holder) this.evict(holder);

    const previous = this.records.get(id);
    if (previous) this.idsByEmail.delete(previous.profile.email);

    const stored = clone(record);
    stored.profile.email = email;
    this.records.set(id, stored);
    this.idsByEmail.set(email, id);
    if (record.type.name !== null || !this.typeNames.has(record.type.id)) {
      this.typeNames.set(record.type.id, record.type.name);
    }

    return Promise.resolve(decision === 'insert' ? 'inserted' : 'updated');
  }

  delete(id: string): Promise<boolean> {
    this.tombstones.mark(id);

    const record = this.records.get(id);
    if (!record) return Promise.resolve(false);

    this.evict(record);
    return Promise.resolve(true);
  }

  snapshot(): UserRecord[] {
    return [...this.records.keys()]
      .sort()
      .map((id) => this.records.get(id))
      .filter((record): record is UserRecord => record !== undefined)
      .map((record) => this.withTypeName(record));
  }

  get size(): number {
    return this.records.size;
  }

  private emailHolder(email: string, exceptId: string): UserRecord | undefined {
    const owner = this.idsByEmail.get(email);
    return owner === undefined || owner === exceptId ? undefined : this.records.get(owner);
  }

  private evict(record: UserRecord): void {
    this.records.delete(record.user.id);
    this.idsByEmail.delete(record.profile.email);
  }

  private withTypeName(record: UserRecord): UserRecord {
    const copy = clone(record);
    copy.type.name = this.typeNames.get(record.type.id) ?? null;
    return copy;
  }
}
