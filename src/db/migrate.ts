import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import type { Database as DatabaseInstance } from 'better-sqlite3';
import { info } from '../pipeline/log';

export const MIGRATIONS_DIR = fileURLToPath(new URL('../../db/migrations', import.meta.url));

function ensureMigrationsTable(db: DatabaseInstance) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function appliedMigrations(db: DatabaseInstance): Set<string> {
  const rows = db
    .prepare<[], { name: string }>('SELECT name FROM _migrations ORDER BY id ASC')
    .all();
  return new Set(rows.map((r) => r.name));
}

function applyMigration(db: DatabaseInstance, name: string, sql: string) {
  db.transaction(() => {
    db.exec(sql);
    db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(name);
  })();
  info('db.migration.applied', { name });
}

/**
 * Applies every `*.sql` file in `dir` not yet recorded in `_migrations`,
 * in file name order. Returns the names applied by this call.
 */
export function migrate(db: DatabaseInstance, dir = MIGRATIONS_DIR): string[] {
  ensureMigrationsTable(db);
  const done = appliedMigrations(db);
  const files = fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
  const applied: string[] = [];
  for (const f of files) {
    if (done.has(f)) continue;
    applyMigration(db, f, fs.readFileSync(path.join(dir, f), 'utf8'));
    applied.push(f);
  }
  return applied;
}
