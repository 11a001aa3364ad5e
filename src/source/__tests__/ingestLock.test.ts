import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { openDb, closeDb } from '../../db/db.js';
import { runMigrations } from '../../db/migrate.js';
import { acquireIngestLock, ingestLockHolder, releaseIngestLock, renewIngestLock } from '../ingestLock.js';
import { StoreUnavailableError } from '../../shared/errors.js';

describe('ingest lock', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    runMigrations(db);
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  it('admits one holder at a time', () => {
    expect(acquireIngestLock(db, 'pass-a', 1000, 0)).toBe(true);
    expect(acquireIngestLock(db, 'pass-b', 1000, 10)).toBe(false);
    expect(ingestLockHolder(db)).toBe('pass-a');
  });

  it('hands the lock over once released', () => {
    acquireIngestLock(db, 'pass-a', 1000, 0);
    releaseIngestLock(db, 'pass-a');

    expect(ingestLockHolder(db)).toBeNull();
    expect(acquireIngestLock(db, 'pass-b', 1000, 10)).toBe(true);
  });

  it('ignores a release from a non-holder', () => {
    acquireIngestLock(db, 'pass-a', 1000, 0);
    releaseIngestLock(db, 'pass-b');

    expect(ingestLockHolder(db)).toBe('pass-a');
  });

  it('lets a lapsed lease be taken over', () => {
    acquireIngestLock(db, 'crashed', 1000, 0);

    expect(acquireIngestLock(db, 'pass-b', 1000, 999)).toBe(false);
    expect(acquireIngestLock(db, 'pass-b', 1000, 1000)).toBe(true);
    expect(ingestLockHolder(db)).toBe('pass-b');
  });

  it('extends the lease on renewal', () => {
    acquireIngestLock(db, 'pass-a', 1000, 0);
    expect(renewIngestLock(db, 'pass-a', 1000, 900)).toBe(true);

    expect(acquireIngestLock(db, 'pass-b', 1000, 1500)).toBe(false);
    expect(acquireIngestLock(db, 'pass-b', 1000, 1900)).toBe(true);
  });

  it('refuses renewal once the lease belongs to someone else', () => {
    acquireIngestLock(db, 'pass-a', 1000, 0);
    acquireIngestLock(db, 'pass-b', 1000, 2000);

    expect(renewIngestLock(db, 'pass-a', 1000, 2100)).toBe(false);
  });

  it('reports an unusable store', () => {
    db.close();
    expect(() => acquireIngestLock(db, 'pass-a', 1000)).toThrow(StoreUnavailableError);
    expect(() => releaseIngestLock(db, 'pass-a')).not.toThrow();
  });
});

describe('ingest lock across connections', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sermonkeeper-lock-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('is shared by every handle on the same file', () => {
    const dbPath = path.join(tmpDir, 'sermons.db');
    const server = openDb(dbPath);
    runMigrations(server);
    const cli = openDb(dbPath);

    try {
      expect(acquireIngestLock(server, 'server-pass', 60000)).toBe(true);
      expect(acquireIngestLock(cli, 'cli-pass', 60000)).toBe(false);
      expect(ingestLockHolder(cli)).toBe('server-pass');

      releaseIngestLock(server, 'server-pass');
      expect(acquireIngestLock(cli, 'cli-pass', 60000)).toBe(true);
    } finally {
      closeDb(cli);
      closeDb(server);
    }
  });
});
