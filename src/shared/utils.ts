import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { nanoid } from 'nanoid';

export function generateId(size = 21): string {
  return nanoid(size);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

/**
 * Current time as `YYYY-MM-DD HH:MM:SS` (UTC), the format stored in `fetched_date`.
 */
export function nowISO(): string {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

const DATE_PARAM = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a `YYYY-MM-DD` calendar date into the start-of-day timestamp used by
 * `fetched_date` comparisons. Returns null for malformed or impossible dates.
 */
export function parseDateParam(raw: string | undefined): string | null {
  if (!raw) return null;
  const trimmed = raw.trim();
  const match = DATE_PARAM.exec(trimmed);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return `${trimmed} 00:00:00`;
}

export function getPackageRoot(): string {
  // Walk up from this file to the directory holding package.json.
  // Works for both tsx (src/shared/utils.ts) and the tsc build (dist/shared/utils.js).
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getSermonkeeperDir(): string {
  return resolvePath('~/.sermonkeeper');
}
