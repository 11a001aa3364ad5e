import type { Db } from '../db/db.js';
import type { CandidateRecord } from './adapter.js';
import { existsByAudioUrl, existsByFilePath, existsByTitle } from './sermonDb.js';

export type DuplicateKey = 'audio_url' | 'file_path' | 'title';

export interface DuplicateMatch {
  key: DuplicateKey;
  value: string;
}

/**
 * Check a candidate against the store on three independent keys:
 * exact audio URL, exact derived file path, exact title.
 * Any single match marks the candidate as already known. Two distinct sermons
 * sharing a title are therefore treated as one.
 */
export function findDuplicate(
  db: Db,
  candidate: CandidateRecord,
  derivedPath: string,
): DuplicateMatch | null {
  if (existsByAudioUrl(db, candidate.audio_url)) {
    return { key: 'audio_url', value: candidate.audio_url };
  }
  if (existsByFilePath(db, derivedPath)) {
    return { key: 'file_path', value: derivedPath };
  }
  if (existsByTitle(db, candidate.title)) {
    return { key: 'title', value: candidate.title };
  }
  return null;
}

export function isDuplicate(db: Db, candidate: CandidateRecord, derivedPath: string): boolean {
  return findDuplicate(db, candidate, derivedPath) !== null;
}
