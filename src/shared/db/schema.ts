/**
 * src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely table interfaces for the local mirror.
 * - Written by hand alongside the migrations in ./migrations; the two must agree.
 *
 * RULES:
 * - snake_case here only; modules shape rows into camelCase domain types.
 * - Timestamps are ISO-8601 UTC strings (portable across SQLite and Postgres,
 *   and their lexical order is their chronological order).
 */

export interface UserTypesTable {
  id: string;
  name: string | null;
}

export interface UsersTable {
  id: string;
  status: string;
  type_id: string;
  created_at: string;
  updated_at: string;
  activated_at: string | null;
  status_changed_at: string | null;
  last_login_at: string | null;
  password_changed_at: string | null;
}

export interface UserProfilesTable {
  user_id: string;
  login: string | null;
  first_name: string;
  last_name: string;
  /** Lower-cased; UNIQUE. */
  email: string;
  phone: string | null;
  second_email: string | null;
  placement_org: string | null;
  portal_access_group: string | null;
  report_group_list: string | null;
  ack_new_business: number | null;
}

export interface DB {
  user_types: UserTypesTable;
  users: UsersTable;
  user_profiles: UserProfilesTable;
}
