/**
 * src/shared/db/migrations/0002_users.ts
 *
 * WHY:
 * - One row per remote Okta user; `id` is the remote id (immutable).
 * - `updated_at` is the remote `lastUpdated` and drives the upsert tie-break.
 *
 * RULES:
 * - Timestamps are text (ISO-8601 UTC) so SQLite and Postgres compare them the same way.
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('users')
    .ifNotExists()
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('type_id', 'text', (col) => col.notNull().references('user_types.id'))
    .addColumn('created_at', 'text', (col) => col.notNull())
    .addColumn('updated_at', 'text', (col) => col.notNull())
    .addColumn('activated_at', 'text')
    .addColumn('status_changed_at', 'text')
    .addColumn('last_login_at', 'text')
    .addColumn('password_changed_at', 'text')
    .execute();

  await db.schema
    .createIndex('idx_users_status')
    .ifNotExists()
    .on('users')
    .column('status')
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('users').ifExists().execute();
}
