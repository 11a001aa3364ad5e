import type { Db } from '../db/db.js';
import type { SermonRecord } from './adapter.js';
import { generateId, nowISO } from '../shared/utils.js';
import { DbError, StoreUnavailableError } from '../shared/errors.js';

export interface InsertSermonData {
  title: string;
  audio_url: string;
  file_path: string;
  categories: string;
}

function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ('code' in err && typeof err.code === 'string') {
    return err.code === 'SQLITE_CONSTRAINT_UNIQUE' || err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
  }
  return err.message.includes('UNIQUE constraint failed');
}

/**
 * Run a read against the store, turning driver failures into StoreUnavailableError:
 * without working reads there are no dedup guarantees.
 */
function read<T>(db: Db, fn: () => T): T {
  if (!db.open) {
    throw new StoreUnavailableError('Database handle is closed');
  }
  try {
    return fn();
  } catch (err) {
    throw new StoreUnavailableError(
      `Store query failed: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

export function assertStoreReady(db: Db): void {
  read(db, () => db.prepare('SELECT 1 FROM sermons LIMIT 1').get());
}

export function existsByAudioUrl(db: Db, audioUrl: string): boolean {
  return read(db, () => db.prepare('SELECT 1 FROM sermons WHERE audio_url = ?').get(audioUrl)) !== undefined;
}

export function existsByFilePath(db: Db, filePath: string): boolean {
  return read(db, () => db.prepare('SELECT 1 FROM sermons WHERE file_path = ?').get(filePath)) !== undefined;
}

export function existsByTitle(db: Db, title: string): boolean {
  return read(db, () => db.prepare('SELECT 1 FROM sermons WHERE title = ?').get(title)) !== undefined;
}

/**
 * Insert one sermon inside a transaction.
 * Returns null when a UNIQUE constraint rejects the row (the transaction is rolled back);
 * any other failure is rolled back and rethrown as DbError.
 */
export function insertSermon(db: Db, data: InsertSermonData): SermonRecord | null {
  const record: SermonRecord = {
    id: generateId(),
    title: data.title,
    audio_url: data.audio_url,
    file_path: data.file_path,
    categories: data.categories,
    fetched_date: nowISO(),
  };

  const insert = db.transaction((row: SermonRecord) => {
    db.prepare(
      `INSERT INTO sermons (id, title, audio_url, file_path, categories, fetched_date)
       VALUES (@id, @title, @audio_url, @file_path, @categories, @fetched_date)`,
    ).run(row);
  });

  try {
    insert(record);
    return record;
  } catch (err) {
    if (isUniqueViolation(err)) {
      return null;
    }
    throw new DbError(`Failed to insert sermon: ${err instanceof Error ? err.message : String(err)}`, {
      audio_url: data.audio_url,
      file_path: data.file_path,
    });
  }
}

/**
 * Records with fetched_date at or after `since` (`YYYY-MM-DD HH:MM:SS`), newest first.
 */
export function listSermonsSince(db: Db, since: string): SermonRecord[] {
  return read(
    db,
    () =>
      db
        .prepare('SELECT * FROM sermons WHERE fetched_date >= ? ORDER BY fetched_date DESC, rowid DESC')
        .all(since) as SermonRecord[],
  );
}

export function getSermon(db: Db, id: string): SermonRecord | undefined {
  return read(db, () => db.prepare('SELECT * FROM sermons WHERE id = ?').get(id) as SermonRecord | undefined);
}

export function countSermons(db: Db): number {
  return read(db, () => (db.prepare('SELECT COUNT(*) as count FROM sermons').get() as { count: number }).count);
}

