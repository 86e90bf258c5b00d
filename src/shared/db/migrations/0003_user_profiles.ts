/**
 * src/shared/db/migrations/0003_user_profiles.ts
 *
 * WHY:
 * - Exactly one profile per user, owned by it (cascade delete).
 * - Email is unique; the DAL lower-cases it so uniqueness is case-insensitive.
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('user_profiles')
    .ifNotExists()
    .addColumn('user_id', 'text', (col) =>
      col.primaryKey().references('users.id').onDelete('cascade'),
    )
    .addColumn('login', 'text')
    .addColumn('first_name', 'text', (col) => col.notNull())
    .addColumn('last_name', 'text', (col) => col.notNull())
    .addColumn('email', 'text', (col) => col.notNull().unique())
    .addColumn('phone', 'text')
    .execute();

  await db.schema
    .createIndex('idx_user_profiles_login')
    .ifNotExists()
    .on('user_profiles')
    .column('login')
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('user_profiles').ifExists().execute();
}
