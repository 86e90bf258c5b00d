/**
 * src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for the mirrored users (raw SQL access).
 * - One joined row = user + profile + type, the shape the store hands out.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { DbExecutor } from '../../../shared/db/db';

export type UserRecordRow = {
  id: string;
  status: string;
  type_id: string;
  type_name: string | null;
  created_at: string;
  updated_at: string;
  activated_at: string | null;
  status_changed_at: string | null;
  last_login_at: string | null;
  password_changed_at: string | null;
  login: string | null;
  first_name: string;
  last_name: string;
  email: string;
  phone: string | null;
  second_email: string | null;
  placement_org: string | null;
  portal_access_group: string | null;
  report_group_list: string | null;
  ack_new_business: number | null;
};

function selectUserRecords(db: DbExecutor) {
  return db
    .selectFrom('users')
    .innerJoin('user_profiles', 'user_profiles.user_id', 'users.id')
    .leftJoin('user_types', 'user_types.id', 'users.type_id')
    .select([
      'users.id',
      'users.status',
      'users.type_id',
      'user_types.name as type_name',
      'users.created_at',
      'users.updated_at',
      'users.activated_at',
      'users.status_changed_at',
      'users.last_login_at',
      'users.password_changed_at',
      'user_profiles.login',
      'user_profiles.first_name',
      'user_profiles.last_name',
      'user_profiles.email',
      'user_profiles.phone',
      'user_profiles.second_email',
      'user_profiles.placement_org',
      'user_profiles.portal_access_group',
      'user_profiles.report_group_list',
      'user_profiles.ack_new_business',
    ]);
}

export async function selectUserRecordByIdSql(
  db: DbExecutor,
  userId: string,
): Promise<UserRecordRow | undefined> {
  return selectUserRecords(db).where('users.id', '=', userId).executeTakeFirst();
}

export async function selectUserRecordByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRecordRow | undefined> {
  return selectUserRecords(db)
    .where('user_profiles.email', '=', email.trim().toLowerCase())
    .executeTakeFirst();
}

export async function selectUserRecordPageSql(
  db: DbExecutor,
  params: { offset: number; limit: number },
): Promise<UserRecordRow[]> {
  return selectUserRecords(db)
    .orderBy('users.id')
    .limit(params.limit)
    .offset(params.offset)
    .execute();
}

export async function countUsersSql(db: DbExecutor): Promise<number> {
  const row = await db
    .selectFrom('users')
    .select((eb) => eb.fn.countAll<number | string | bigint>().as('total'))
    .executeTakeFirstOrThrow();

  return Number(row.total);
}

export async function selectUserUpdatedAtSql(
  db: DbExecutor,
  userId: string,
): Promise<string | undefined> {
  const row = await db
    .selectFrom('users')
    .select('updated_at')
    .where('id', '=', userId)
    .executeTakeFirst();

  return row?.updated_at;
}

export type EmailHolderRow = {
  user_id: string;
  updated_at: string;
};

/** The user (other than `exceptUserId`) whose profile holds `email`. */
export async function selectEmailHolderSql(
  db: DbExecutor,
  email: string,
  exceptUserId: string,
): Promise<EmailHolderRow | undefined> {
  return db
    .selectFrom('user_profiles')
    .innerJoin('users', 'users.id', 'user_profiles.user_id')
    .select(['user_profiles.user_id', 'users.updated_at'])
    .where('user_profiles.email', '=', email.trim().toLowerCase())
    .where('user_profiles.user_id', '!=', exceptUserId)
    .executeTakeFirst();
}
