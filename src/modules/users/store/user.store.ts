/**
 * src/modules/users/store/user.store.ts
 *
 * WHY:
 * - The repository contract the sync engine and the user service depend on.
 * - Swapping SqlUserStore for InMemUserStore never touches the engine.
 *
 * CONTRACT:
 * - upsert() is atomic per record (type + user + profile, or nothing) and
 *   idempotent. Ties are broken by remote updatedAt: an incoming record that is
 *   older than the stored one is a no-op, never a regression.
 * - delete() removes the user and its profile together and leaves a tombstone:
 *   a later upsert of a version produced before the deletion is skipped.
 * - Email is unique across users. An upsert evicts a local holder of its email
 *   whose version is older (that row is stale); a holder at least as new is a
 *   CONFLICT.
 */

import type { UpsertOutcome, UserPage, UserRecord } from '../user.types';

export interface UserStore {
  getById(id: string): Promise<UserRecord | undefined>;
  getByEmail(email: string): Promise<UserRecord | undefined>;
  upsert(record: UserRecord): Promise<UpsertOutcome>;
  /** Returns true when a stored user was removed. */
  delete(id: string): Promise<boolean>;
  listPage(offset: number, limit: number): Promise<UserPage>;
}

/** Decides what an upsert should do given the stored version, before any write. */
export function compareVersions(
  storedUpdatedAt: string | undefined,
  incomingUpdatedAt: string,
): 'insert' | 'update' | 'unchanged' | 'stale' {
  if (storedUpdatedAt === undefined) return 'insert';
  if (storedUpdatedAt === incomingUpdatedAt) return 'unchanged';
  return storedUpdatedAt > incomingUpdatedAt ? 'stale' : 'update';
}

/**
 * In-process record of deletions, keyed by user id.
 * Mitigates the delete-vs-sync race: a sync upsert carrying a version that is
 * not newer than the deletion time is dropped instead of resurrecting the user.
 */
export class Tombstones {
  private readonly deletedAt = new Map<string, string>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  mark(id: string): string {
    const at = this.now().toISOString();
    this.deletedAt.set(id, at);
    return at;
  }

  /** True when `updatedAt` predates (or equals) the recorded deletion of `id`. */
  suppresses(id: string, updatedAt: string): boolean {
    const at = this.deletedAt.get(id);
    return at !== undefined && updatedAt <= at;
  }
}
