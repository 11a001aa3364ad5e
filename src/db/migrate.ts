import fs from 'node:fs';
import path from 'node:path';
import type { Db } from './db.js';
import { StoreUnavailableError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

/**
 * Apply every `*.sql` file in `migrationsDir` not yet recorded in `_migrations`, in
 * file-name order, each in its own transaction. A store whose schema cannot be brought
 * up to date is unusable, so failures surface as StoreUnavailableError.
 */
export function runMigrations(db: Db, migrationsDir: string = defaultMigrationsDir()): MigrationResult {
  if (!fs.existsSync(migrationsDir)) {
    throw new StoreUnavailableError(`Migrations directory not found: ${migrationsDir}`);
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const recorded = db.prepare('SELECT name FROM _migrations ORDER BY name').all() as Array<{ name: string }>;
  const skipped = recorded.map((r) => r.name);
  const done = new Set(skipped);

  const pending = fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql') && !done.has(f))
    .sort();

  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');
  const apply = db.transaction((name: string, sql: string) => {
    db.exec(sql);
    record.run(name);
  });

  const applied: string[] = [];
  for (const name of pending) {
    try {
      apply(name, fs.readFileSync(path.join(migrationsDir, name), 'utf-8'));
    } catch (err) {
      throw new StoreUnavailableError(`Migration failed: ${name}`, {
        migration: name,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    applied.push(name);
    logger.info({ migration: name }, 'Migration applied');
  }

  if (applied.length > 0) {
    logger.debug({ applied: applied.length, skipped: skipped.length }, 'Store schema up to date');
  }
  return { applied, skipped };
}
