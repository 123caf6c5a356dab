import { readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import type Database from 'better-sqlite3';

const MIGRATIONS_DIR = fileURLToPath(new URL('../migrations/', import.meta.url));

function listMigrations(dir: string = MIGRATIONS_DIR): string[] {
  return readdirSync(dir)
    .filter((name) => name.endsWith('.sql'))
    .sort();
}

// Applies pending migrations in file-name order. Each file runs in its own transaction.
export function applyMigrations(sqlite: Database.Database, dir: string = MIGRATIONS_DIR): string[] {
  sqlite.exec(
    'CREATE TABLE IF NOT EXISTS _migrations (name TEXT PRIMARY KEY, applied_at INTEGER NOT NULL)',
  );

  const applied = new Set(
    sqlite
      .prepare<[], { name: string }>('SELECT name FROM _migrations')
      .all()
      .map((row) => row.name),
  );

  const ran: string[] = [];
  for (const name of listMigrations(dir)) {
    if (applied.has(name)) continue;

    const body = readFileSync(join(dir, name), 'utf8');
    sqlite.transaction(() => {
      sqlite.exec(body);
      sqlite
        .prepare('INSERT INTO _migrations (name, applied_at) VALUES (?, ?)')
        .run(name, Math.floor(Date.now() / 1000));
    })();
    ran.push(name);
  }

  return ran;
}
