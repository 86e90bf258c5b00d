/**
 * src/shared/db/migrations/0004_user_profiles_org_attributes.ts
 *
 * WHY:
 * - The org's custom Okta profile attributes are mirrored too, so `users get`
 *   shows them from the local store and `users update` can change them.
 *
 * RULES:
 * - Additive migration only (existing rows get NULL until the next sync).
 * - One column per statement: SQLite's ALTER TABLE adds a single column.
 */

import type { Kysely } from 'kysely';

const TEXT_COLUMNS = ['second_email', 'placement_org', 'portal_access_group', 'report_group_list'];

export async function up(db: Kysely<any>): Promise<void> {
  for (const column of TEXT_COLUMNS) {
    await db.schema.alterTable('user_profiles').addColumn(column, 'text').execute();
  }
  await db.schema.alterTable('user_profiles').addColumn('ack_new_business', 'integer').execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  for (const column of [...TEXT_COLUMNS, 'ack_new_business']) {
    await db.schema.alterTable('user_profiles').dropColumn(column).execute();
  }
}
