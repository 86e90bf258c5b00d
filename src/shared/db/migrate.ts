/**
 * src/shared/db/migrate.ts
 *
 * WHY:
 * - The mirror's schema must exist before any command touches the store.
 * - Runs on every CLI start (idempotent); there is no separate migrate step.
 */

import { Migrator } from 'kysely';
import type { Kysely, MigrationProvider } from 'kysely';

import type { Logger } from '../logger/logger';
import { AppError } from '../errors/errors';
import { migrations } from './migrations';

const provider: MigrationProvider = {
  getMigrations() {
    return Promise.resolve(migrations);
  },
};

export async function migrateToLatest<T>(db: Kysely<T>, logger?: Logger): Promise<void> {
  const migrator = new Migrator({ db, provider });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger?.debug('db.migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger?.error('db.migration.error', { migration: r.migrationName });
  });

  if (error) {
    logger?.error('db.migration.failed', { err: error });
    throw AppError.fatal('Local store is unavailable: schema migration failed', undefined, error);
  }
}
