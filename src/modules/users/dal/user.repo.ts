/**
 * src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for the mirrored users (mutations).
 *
 * RULES:
 * - No transactions started here (the store owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { Profile, User, UserTypeRef } from '../user.types';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Returns a repo bound to a different executor (e.g. a transaction).
   * This keeps the "repo instance" pattern while supporting trx usage.
   */
  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Types are shared references. A known name is refreshed; a missing one
   * never blanks a name learned earlier.
   */
  async upsertUserType(type: UserTypeRef): Promise<void> {
    const insert = this.db.insertInto('user_types').values({ id: type.id, name: type.name });

    if (type.name === null) {
      await insert.onConflict((oc) => oc.column('id').doNothing()).execute();
      return;
    }

    await insert
      .onConflict((oc) => oc.column('id').doUpdateSet({ name: type.name }))
      .execute();
  }

  /**
   * Inserts the user, or updates it only when the stored row is OLDER than
   * the incoming one. Returns false when the conditional update matched nothing
   * (a newer or equal version was committed concurrently).
   */
  async upsertUserIfNewer(user: User): Promise<boolean> {
    const row = {
      id: user.id,
      status: user.status,
      type_id: user.typeId,
      created_at: user.createdAt,
      updated_at: user.updatedAt,
      activated_at: user.activatedAt,
      status_changed_at: user.statusChangedAt,
      last_login_at: user.lastLoginAt,
      password_changed_at: user.passwordChangedAt,
    };

    const res = await this.db
      .insertInto('users')
      .values(row)
      .onConflict((oc) =>
        oc
          .column('id')
          .doUpdateSet({
            status: row.status,
            type_id: row.type_id,
            created_at: row.created_at,
            updated_at: row.updated_at,
            activated_at: row.activated_at,
            status_changed_at: row.status_changed_at,
            last_login_at: row.last_login_at,
            password_changed_at: row.password_changed_at,
          })
          .where('users.updated_at', '<', row.updated_at),
      )
      .executeTakeFirst();

    return Number(res.numInsertedOrUpdatedRows ?? 0) > 0;
  }

  async upsertProfile(profile: Profile): Promise<void> {
    const row = {
      user_id: profile.userId,
      login: profile.login,
      first_name: profile.firstName,
      last_name: profile.lastName,
      email: profile.email.toLowerCase(),
      phone: profile.phone,
      second_email: profile.secondEmail,
      placement_org: profile.placementOrg,
      portal_access_group: profile.portalAccessGroup,
      report_group_list: profile.reportGroupList,
      ack_new_business: profile.ackNewBusiness,
    };

    await this.db
      .insertInto('user_profiles')
      .values(row)
      .onConflict((oc) =>
        oc.column('user_id').doUpdateSet({
          login: row.login,
          first_name: row.first_name,
          last_name: row.last_name,
          email: row.email,
          phone: row.phone,
          second_email: row.second_email,
          placement_org: row.placement_org,
          portal_access_group: row.portal_access_group,
          report_group_list: row.report_group_list,
          ack_new_business: row.ack_new_business,
        }),
      )
      .execute();
  }

  /**
   * Deletes the profile first, then the user (FK order; the cascade is declared too).
   * Returns true if a user row was removed.
   */
  async deleteUser(userId: string): Promise<boolean> {
    await this.db.deleteFrom('user_profiles').where('user_id', '=', userId).execute();
    const res = await this.db.deleteFrom('users').where('id', '=', userId).executeTakeFirst();

    return Number(res.numDeletedRows) > 0;
  }
}
