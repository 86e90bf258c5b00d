/**
 * src/modules/users/user.service.ts
 *
 * WHY:
 * - Routes reads to the local mirror or the live Okta API ("source").
 * - Orchestrates writes so local state never leads remote state.
 *
 * RULES:
 * - Writes (update/delete) hit the remote API first; the store is mutated only
 *   after the remote call succeeded.
 * - A remote read writes the record back into the store best-effort: a failed
 *   write-back is logged, never surfaced.
 * - No raw DB access here (UserStore only).
 */

import type { Logger } from '../../shared/logger/logger';
import { isAppError } from '../../shared/errors/errors';
import type { CallOptions, PasswordResetResult, RawUser, UsersApi } from '../okta';

import { mapRecord } from './user.mapper';
import { UserErrors } from './user.errors';
import { ProfileUpdateSchema } from './user.schemas';
import type { UserStore } from './store/user.store';
import type {
  UpsertOutcome,
  UserPage,
  UserRecord,
  UserSelector,
  UserSource,
} from './user.types';

export type UpdateUserResult = {
  record: UserRecord;
  localOutcome: UpsertOutcome;
};

export type DeleteUserResult = {
  id: string;
  removedLocally: boolean;
};

export type ListUsersResult = UserPage & { page: number };

function describeSelector(selector: UserSelector): Record<string, string> {
  return 'id' in selector ? { id: selector.id } : { email: selector.email };
}

export class UserService {
  constructor(
    private readonly deps: {
      store: UserStore;
      remote: UsersApi;
      logger: Logger;
    },
  ) {}

  async get(selector: UserSelector, source: UserSource, opts: CallOptions = {}): Promise<UserRecord> {
    if (source === 'local') {
      const found =
        'id' in selector
          ? await this.deps.store.getById(selector.id)
          : await this.deps.store.getByEmail(selector.email);

      if (!found) throw UserErrors.userNotFound({ source, ...describeSelector(selector) });
      return found;
    }

    const raw =
      'id' in selector
        ? await this.deps.remote.getUserById(selector.id, opts)
        : await this.deps.remote.findUserByEmail(selector.email, opts);

    if (raw === undefined) throw UserErrors.userNotFound({ source, ...describeSelector(selector) });

    const record = this.toRecord(raw);
    await this.writeBack(record);
    return record;
  }

  async update(id: string, fields: unknown, opts: CallOptions = {}): Promise<UpdateUserResult> {
    const parsed = ProfileUpdateSchema.safeParse(fields);
    if (!parsed.success) {
      throw UserErrors.invalidProfileUpdate(
        parsed.error.issues.map((issue) => issue.message).join('; '),
        { id },
      );
    }

    const raw = await this.deps.remote.updateUserProfile(id, parsed.data, opts);
    const record = this.toRecord(raw);

    // remote succeeded: mirror it (store failures surface, the cache must not silently diverge)
    const localOutcome = await this.deps.store.upsert(record);

    this.deps.logger.info('users.update.done', { userId: id, localOutcome });
    return { record, localOutcome };
  }

  async delete(selector: UserSelector, opts: CallOptions = {}): Promise<DeleteUserResult> {
    const id = 'id' in selector ? selector.id : await this.resolveIdByEmail(selector.email, opts);

    try {
      await this.deps.remote.deleteUser(id, opts);
    } catch (err) {
      if (isAppError(err) && err.code === 'NOT_FOUND') {
        // gone remotely: the local copy is stale, drop it before reporting the miss
        const purged = await this.deps.store.delete(id);
        this.deps.logger.warn('users.delete.remote_missing', { userId: id, purgedLocally: purged });
      }
      throw err;
    }

    const removedLocally = await this.deps.store.delete(id);

    this.deps.logger.info('users.delete.done', { userId: id, removedLocally });
    return { id, removedLocally };
  }

  async list(page: number, limit: number): Promise<ListUsersResult> {
    if (!Number.isInteger(page) || page < 1 || !Number.isInteger(limit) || limit < 1) {
      throw UserErrors.invalidPaging({ page, limit });
    }

    const result = await this.deps.store.listPage((page - 1) * limit, limit);
    return { ...result, page };
  }

  resetPassword(
    id: string,
    params: { sendEmail: boolean },
    opts: CallOptions = {},
  ): Promise<PasswordResetResult> {
    this.deps.logger.info('users.reset_password', { userId: id, sendEmail: params.sendEmail });
    return this.deps.remote.resetPassword(id, params, opts);
  }

  private toRecord(raw: RawUser): UserRecord {
    const mapped = mapRecord(raw);
    if (!mapped.ok) {
      throw UserErrors.invalidRemoteRecord(mapped.error.reason, { id: mapped.error.id });
    }
    return mapped.record;
  }

  private async writeBack(record: UserRecord): Promise<void> {
    try {
      const outcome = await this.deps.store.upsert(record);
      this.deps.logger.debug('users.write_back', { userId: record.user.id, outcome });
    } catch (err) {
      this.deps.logger.warn('users.write_back.failed', { userId: record.user.id, err });
    }
  }

  private async resolveIdByEmail(email: string, opts: CallOptions): Promise<string> {
    const local = await this.deps.store.getByEmail(email);
    if (local) return local.user.id;

    const raw = await this.deps.remote.findUserByEmail(email, opts);
    if (raw === undefined) throw UserErrors.userNotFound({ email });

    const mapped = mapRecord(raw);
    const id = mapped.ok ? mapped.record.user.id : mapped.error.id;
    if (id === null) throw UserErrors.invalidRemoteRecord('user has no id', { email });

    return id;
  }
}
