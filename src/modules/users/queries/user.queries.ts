/**
 * src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into UserRecord domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  countUsersSql,
  selectUserRecordByEmailSql,
  selectUserRecordByIdSql,
  selectUserRecordPageSql,
} from '../dal/user.query-sql';
import type { UserRecordRow } from '../dal/user.query-sql';
import { USER_STATUSES } from '../user.types';
import type { UserPage, UserRecord, UserStatus } from '../user.types';

function toStatus(value: string): UserStatus {
  const status = USER_STATUSES.find((known) => known === value);
  if (!status) throw new Error(`Unknown user status in local store: ${value}`);
  return status;
}

export function toUserRecord(row: UserRecordRow): UserRecord {
  return {
    user: {
      id: row.id,
      status: toStatus(row.status),
      typeId: row.type_id,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      activatedAt: row.activated_at ?? null,
      statusChangedAt: row.status_changed_at ?? null,
      lastLoginAt: row.last_login_at ?? null,
      passwordChangedAt: row.password_changed_at ?? null,
    },
    profile: {
      userId: row.id,
      login: row.login ?? null,
      firstName: row.first_name,
      lastName: row.last_name,
      email: row.email,
      phone: row.phone ?? null,
      secondEmail: row.second_email ?? null,
      placementOrg: row.placement_org ?? null,
      portalAccessGroup: row.portal_access_group ?? null,
      reportGroupList: row.report_group_list ?? null,
      ackNewBusiness: row.ack_new_business ?? null,
    },
    type: {
      id: row.type_id,
      name: row.type_name ?? null,
    },
  };
}

export async function getUserRecordById(
  db: DbExecutor,
  userId: string,
): Promise<UserRecord | undefined> {
  const row = await selectUserRecordByIdSql(db, userId);
  if (!row) return undefined;
  return toUserRecord(row);
}

export async function getUserRecordByEmail(
  db: DbExecutor,
  email: string,
): Promise<UserRecord | undefined> {
  const row = await selectUserRecordByEmailSql(db, email);
  if (!row) return undefined;
  return toUserRecord(row);
}

export async function listUserRecords(
  db: DbExecutor,
  params: { offset: number; limit: number },
): Promise<UserPage> {
  const [rows, total] = await Promise.all([selectUserRecordPageSql(db, params), countUsersSql(db)]);

  return {
    items: rows.map(toUserRecord),
    total,
    offset: params.offset,
    limit: params.limit,
  };
}
