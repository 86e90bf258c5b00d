/**
 * src/shared/db/migrations/0001_user_types.ts
 *
 * WHY:
 * - Okta user types are shared references: many users point at one type.
 * - `name` is nullable because the user payload only carries the type id.
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('user_types')
    .ifNotExists()
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('name', 'text')
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('user_types').ifExists().execute();
}
