import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { StoreUnavailableError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type Db = Database.Database;

/**
 * Open the metadata store. The returned handle is owned by the caller, who
 * passes it to every component that needs it and closes it on shutdown.
 */
export function openDb(dbPath: string): Db {
  const resolved = dbPath === ':memory:' ? ':memory:' : resolvePath(dbPath);

  try {
    if (resolved !== ':memory:') {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
    }

    const db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');

    logger.debug({ path: resolved }, 'Database opened');
    return db;
  } catch (err) {
    throw new StoreUnavailableError(`Failed to open database at ${resolved}`, {
      path: resolved,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

export function closeDb(db: Db): void {
  if (db.open) {
    db.close();
    logger.debug('Database closed');
  }
}
