import type { Db } from '../db/db.js';
import { StoreUnavailableError } from '../shared/errors.js';

/**
 * Store-wide ingest lease. Every process sharing the database sees the same row,
 * so a CLI pass and a server pass cannot overlap. The holder renews the lease
 * between candidates; a lease left behind by a crashed process lapses at `expires_at`.
 */

function storeCall<T>(db: Db, what: string, fn: () => T): T {
  if (!db.open) {
    throw new StoreUnavailableError('Database handle is closed');
  }
  try {
    return fn();
  } catch (err) {
    throw new StoreUnavailableError(`${what}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Claim the lease for `holder`. Returns false while another holder's lease is live.
 */
export function acquireIngestLock(db: Db, holder: string, ttlMs: number, now: number = Date.now()): boolean {
  return storeCall(db, 'Ingest lock claim failed', () => {
    const claim = db.transaction(() => {
      db.prepare('DELETE FROM ingest_lock WHERE expires_at <= ?').run(now);
      const result = db
        .prepare(
          `INSERT INTO ingest_lock (id, holder, acquired_at, expires_at)
           VALUES (1, ?, ?, ?)
           ON CONFLICT(id) DO NOTHING`,
        )
        .run(holder, now, now + ttlMs);
      return result.changes === 1;
    });
    return claim.immediate();
  });
}

/**
 * Extend the lease. Returns false when `holder` no longer owns it.
 */
export function renewIngestLock(db: Db, holder: string, ttlMs: number, now: number = Date.now()): boolean {
  return storeCall(db, 'Ingest lock renewal failed', () => {
    const result = db
      .prepare('UPDATE ingest_lock SET expires_at = ? WHERE id = 1 AND holder = ?')
      .run(now + ttlMs, holder);
    return result.changes === 1;
  });
}

export function releaseIngestLock(db: Db, holder: string): void {
  if (!db.open) return;
  storeCall(db, 'Ingest lock release failed', () => {
    db.prepare('DELETE FROM ingest_lock WHERE id = 1 AND holder = ?').run(holder);
  });
}

export function ingestLockHolder(db: Db): string | null {
  return storeCall(db, 'Ingest lock lookup failed', () => {
    const row = db.prepare('SELECT holder FROM ingest_lock WHERE id = 1').get() as { holder: string } | undefined;
    return row?.holder ?? null;
  });
}
