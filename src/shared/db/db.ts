/**
 * src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection for the local mirror.
 * - SQLite (better-sqlite3) is the default: a single file next to the CLI config.
 * - Postgres (pg) is used when DATABASE_URL is a postgres:// URL, for teams that
 *   share one mirror.
 *
 * HOW TO USE:
 * - const db = createDb(config.databaseUrl, { poolSize: config.syncConcurrency })
 * - await migrateToLatest(db) before first use (see ./migrate.ts).
 */

import fs from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';
import pg from 'pg';
import { Kysely, PostgresDialect, SqliteDialect } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both main DB and transactions (we pass `trx`).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export type DbDialectName = 'sqlite' | 'postgres';

export function dialectFor(databaseUrl: string): DbDialectName {
  return /^postgres(ql)?:\/\//i.test(databaseUrl) ? 'postgres' : 'sqlite';
}

function sqliteFilename(databaseUrl: string): string {
  return databaseUrl.startsWith('file:') ? databaseUrl.slice('file:'.length) : databaseUrl;
}

export function createDb(databaseUrl: string, opts: { poolSize?: number } = {}): Db {
  if (dialectFor(databaseUrl) === 'postgres') {
    const pool = new pg.Pool({
      connectionString: databaseUrl,
      // one connection per sync worker, never fewer than the old default
      max: Math.max(10, opts.poolSize ?? 0),
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 10_000,
    });

    return new Kysely<DB>({
      dialect: new PostgresDialect({ pool }),
    });
  }

  const filename = sqliteFilename(databaseUrl);
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const sqlite = new Database(filename);
  sqlite.pragma('foreign_keys = ON');
  if (filename !== ':memory:') sqlite.pragma('journal_mode = WAL');

  return new Kysely<DB>({
    dialect: new SqliteDialect({ database: sqlite }),
  });
}
