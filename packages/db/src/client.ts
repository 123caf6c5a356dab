import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';

import { applyMigrations } from './migrate';
import * as schema from './schema';

export { and, asc, eq, inArray, isNotNull, isNull, lt, lte } from 'drizzle-orm';

export type SqliteDatabase = Database.Database;

export type Db = ReturnType<typeof getDb>;
export type DbTransaction = Parameters<Parameters<Db['transaction']>[0]>[0];

export function getDb(sqlite: SqliteDatabase) {
  return drizzle(sqlite, { schema });
}

export type OpenDatabaseOptions = {
  // ':memory:' opens a private in-memory database.
  filename: string;
  busyTimeoutMs?: number;
};

export function openDatabase(opts: OpenDatabaseOptions): { sqlite: SqliteDatabase; db: Db } {
  if (opts.filename !== ':memory:') {
    mkdirSync(dirname(opts.filename), { recursive: true });
  }

  const sqlite = new Database(opts.filename, { timeout: opts.busyTimeoutMs ?? 5000 });
  if (opts.filename !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');

  applyMigrations(sqlite);
  return { sqlite, db: getDb(sqlite) };
}
