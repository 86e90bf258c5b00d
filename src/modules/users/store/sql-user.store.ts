/**
 * src/modules/users/store/sql-user.store.ts
 *
 * WHY:
 * - Production UserStore over Kysely (SQLite or Postgres).
 * - Only place in the users module allowed to start transactions.
 *
 * RULES:
 * - One transaction per record: type + user + profile commit together or not at all.
 * - The users row is written with a conditional upsert (`updated_at < incoming`),
 *   so concurrent writers of the same id cannot regress it even across connections.
 * - The tombstone check runs inside the transaction, next to the writes it guards.
 * - Emails move between ids remotely (swaps, renames). A local holder of the
 *   incoming email with an older version is stale: it is evicted in the same
 *   transaction and comes back when its own record is upserted. A holder at
 *   least as new is a CONFLICT.
 * - Driver-level unique-email violations (concurrent writers) are CONFLICT too;
 *   every other store failure propagates as-is.
 */

import type { Db, DbExecutor } from '../../../shared/db/db';
import type { Logger } from '../../../shared/logger/logger';
import { selectEmailHolderSql, selectUserUpdatedAtSql } from '../dal/user.query-sql';
import { UserRepo } from '../dal/user.repo';
import { getUserRecordByEmail, getUserRecordById, listUserRecords } from '../queries/user.queries';
import { UserErrors } from '../user.errors';
import type { UpsertOutcome, UserPage, UserRecord } from '../user.types';

import { Tombstones, compareVersions } from './user.store';
import type { UserStore } from './user.store';

/** better-sqlite3 and pg report the same violation differently. */
function isUniqueEmailViolation(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;

  if (err.code === 'SQLITE_CONSTRAINT_UNIQUE') {
    return err.message.includes('user_profiles.email');
  }
  if (err.code === '23505') {
    return 'constraint' in err && typeof err.constraint === 'string' && err.constraint.includes('email');
  }
  return false;
}

export class SqlUserStore implements UserStore {
  private readonly userRepo: UserRepo;
  private readonly tombstones: Tombstones;

  constructor(private readonly deps: { db: Db; tombstones?: Tombstones; logger?: Logger }) {
    this.userRepo = new UserRepo(deps.db);
    this.tombstones = deps.tombstones ?? new Tombstones();
  }

  getById(id: string): Promise<UserRecord | undefined> {
    return getUserRecordById(this.deps.db, id);
  }

  getByEmail(email: string): Promise<UserRecord | undefined> {
    return getUserRecordByEmail(this.deps.db, email);
  }

  listPage(offset: number, limit: number): Promise<UserPage> {
    return listUserRecords(this.deps.db, { offset, limit });
  }

  async upsert(record: UserRecord): Promise<UpsertOutcome> {
    try {
      return await this.deps.db.transaction().execute((trx) => this.upsertInTx(trx, record));
    } catch (err) {
      if (isUniqueEmailViolation(err)) {
        throw UserErrors.emailTaken({ id: record.user.id, email: record.profile.email });
      }
      throw err;
    }
  }

  async delete(id: string): Promise<boolean> {
    // tombstone first: an upsert racing with this delete must already see it
    this.tombstones.mark(id);

    return this.deps.db.transaction().execute((trx) => this.userRepo.withDb(trx).deleteUser(id));
  }

  private async upsertInTx(trx: DbExecutor, record: UserRecord): Promise<UpsertOutcome> {
    if (this.tombstones.suppresses(record.user.id, record.user.updatedAt)) return 'deleted';

    const repo = this.userRepo.withDb(trx);

    const stored = await selectUserUpdatedAtSql(trx, record.user.id);
    const decision = compareVersions(stored, record.user.updatedAt);
    if (decision === 'unchanged' || decision === 'stale') return decision;

    await repo.upsertUserType(record.type);

    const written = await repo.upsertUserIfNewer(record.user);
    if (!written) return 'stale';

    await this.evictStaleEmailHolder(trx, repo, record);
    await repo.upsertProfile(record.profile);

    return decision === 'insert' ? 'inserted' : 'updated';
  }

  private async evictStaleEmailHolder(trx: DbExecutor, repo: UserRepo, record: UserRecord): Promise<void> {
    const holder = await selectEmailHolderSql(trx, record.profile.email, record.user.id);
    if (!holder) return;

    if (holder.updated_at >= record.user.updatedAt) {
      throw UserErrors.emailTaken({
        id: record.user.id,
        email: record.profile.email,
        owner: holder.user_id,
      });
    }

    await repo.deleteUser(holder.user_id);
    this.deps.logger?.info('users.store.email_holder_evicted', {
      userId: record.user.id,
      evictedUserId: holder.user_id,
    });
  }
}
