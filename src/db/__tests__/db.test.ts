import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { openDb, closeDb } from '../db.js';
import { StoreUnavailableError } from '../../shared/errors.js';

let tmpDir: string | null = null;

afterEach(() => {
  if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
  tmpDir = null;
});

describe('openDb', () => {
  it('creates the parent directory and opens the file', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sermonkeeper-db-'));
    const dbPath = path.join(tmpDir, 'nested', 'sermons.db');

    const db = openDb(dbPath);

    expect(db.open).toBe(true);
    expect(fs.existsSync(dbPath)).toBe(true);
    closeDb(db);
    expect(db.open).toBe(false);
  });

  it('throws StoreUnavailableError when the path cannot be opened', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sermonkeeper-db-'));

    expect(() => openDb(tmpDir ?? '')).toThrow(StoreUnavailableError);
  });

  it('tolerates closing twice', () => {
    const db = openDb(':memory:');
    closeDb(db);
    expect(() => closeDb(db)).not.toThrow();
  });
});
