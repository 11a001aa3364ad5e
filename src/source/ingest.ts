import fs from 'node:fs';
import type { Db } from '../db/db.js';
import type { Config } from '../shared/config.js';
import type { CandidateRecord, FetchResult, SourceDescriptor } from './adapter.js';
import { describeSource, formatCategories, normalizeCandidate } from './adapter.js';
import { fetchSource } from './sources.js';
import { findDuplicate } from './dedup.js';
import { deriveAudioPath, downloadAudio } from './download.js';
import { assertStoreReady, existsByFilePath, insertSermon } from './sermonDb.js';
import { acquireIngestLock, ingestLockHolder, releaseIngestLock, renewIngestLock } from './ingestLock.js';
import {
  IngestBusyError,
  SourceUnavailableError,
  StoreUnavailableError,
  errorMessage,
} from '../shared/errors.js';
import { generateId, resolvePath } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface IngestOptions {
  source: SourceDescriptor;
  /** Checked between candidates; an in-flight download is never interrupted. */
  signal?: AbortSignal;
  /** Replaces the adapter lookup, mainly for tests. */
  fetchCandidates?: (source: SourceDescriptor) => Promise<FetchResult>;
}

export type CandidateOutcome = 'inserted' | 'duplicate' | 'failed';

export interface IngestStats {
  source: string;
  status: 'completed' | 'cancelled';
  candidatesFetched: number;
  inserted: number;
  duplicates: number;
  failed: number;
  sourceUnavailable: boolean;
  errors: Array<{ audio_url?: string; error: string }>;
  durationMs: number;
}

interface PassContext {
  db: Db;
  audioDir: string;
  config: Config;
}

/**
 * Run one ingestion pass over a single source.
 *
 * Candidates are processed one at a time. A failure on one candidate is logged and
 * counted, and the pass moves on to the next. Only an unusable store aborts the pass.
 */
export async function runIngest(db: Db, config: Config, options: IngestOptions): Promise<IngestStats> {
  const startTime = Date.now();
  const stats: IngestStats = {
    source: describeSource(options.source),
    status: 'completed',
    candidatesFetched: 0,
    inserted: 0,
    duplicates: 0,
    failed: 0,
    sourceUnavailable: false,
    errors: [],
    durationMs: 0,
  };

  assertStoreReady(db);

  const holder = generateId();
  const ttlMs = config.schedule.lock_ttl_ms;
  if (!acquireIngestLock(db, holder, ttlMs)) {
    throw new IngestBusyError('Another ingest pass holds the store lock', { holder: ingestLockHolder(db) });
  }

  try {
    await runCandidates(db, config, options, stats, holder);
  } finally {
    try {
      releaseIngestLock(db, holder);
    } catch (err) {
      logger.error({ holder, error: errorMessage(err) }, 'Failed to release ingest lock');
    }
  }

  stats.durationMs = Date.now() - startTime;
  logger.info(
    {
      source: stats.source,
      status: stats.status,
      inserted: stats.inserted,
      duplicates: stats.duplicates,
      failed: stats.failed,
      durationMs: stats.durationMs,
    },
    'Ingest complete',
  );

  return stats;
}

async function runCandidates(
  db: Db,
  config: Config,
  options: IngestOptions,
  stats: IngestStats,
  holder: string,
): Promise<void> {
  const audioDir = resolvePath(config.audio_dir);
  fs.mkdirSync(audioDir, { recursive: true });

  let candidates: CandidateRecord[] = [];
  try {
    const fetchCandidates = options.fetchCandidates ?? ((source: SourceDescriptor) => fetchSource(config, source));
    const result = await fetchCandidates(options.source);
    candidates = result.candidates;
  } catch (err) {
    if (!(err instanceof SourceUnavailableError)) throw err;
    stats.sourceUnavailable = true;
    stats.errors.push({ error: err.message });
    logger.warn({ source: stats.source, error: err.message }, 'Source unavailable');
  }
  stats.candidatesFetched = candidates.length;

  const ctx: PassContext = { db, audioDir, config };

  for (const candidate of candidates) {
    if (options.signal?.aborted) {
      stats.status = 'cancelled';
      logger.info({ source: stats.source }, 'Ingest cancelled between candidates');
      break;
    }
    if (!renewIngestLock(db, holder, config.schedule.lock_ttl_ms)) {
      stats.status = 'cancelled';
      stats.errors.push({ error: 'Ingest lock lost' });
      logger.warn({ source: stats.source, holder }, 'Ingest lock lost, stopping pass');
      break;
    }

    let outcome: CandidateOutcome;
    try {
      outcome = await processCandidate(ctx, normalizeCandidate(candidate));
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      const message = errorMessage(err);
      logger.error({ title: candidate.title, audio_url: candidate.audio_url, error: message }, 'Error processing sermon');
      stats.errors.push({ audio_url: candidate.audio_url, error: message });
      outcome = 'failed';
    }

    if (outcome === 'inserted') stats.inserted++;
    else if (outcome === 'duplicate') stats.duplicates++;
    else stats.failed++;
  }
}

/**
 * dedup check → drift check → download → path reconciliation → transactional insert.
 * Throws for download and unexpected insert failures; the caller counts those as failed.
 */
async function processCandidate(ctx: PassContext, candidate: CandidateRecord): Promise<CandidateOutcome> {
  const { db, audioDir, config } = ctx;
  const { title, audio_url } = candidate;
  let filePath = deriveAudioPath(audio_url, audioDir);

  const match = findDuplicate(db, candidate, filePath);
  if (match) {
    logger.info({ title, audio_url, matched_on: match.key }, 'Duplicate already stored');
    return 'duplicate';
  }

  // No record references this path, so a file here is left over from a pass that
  // downloaded it and never committed. Start over from a clean download.
  if (fs.existsSync(filePath)) {
    logger.info({ title, file_path: filePath }, 'Audio file on disk without a record, removing to force re-download');
    await fs.promises.rm(filePath, { force: true });
  }

  logger.debug({ title, audio_url, categories: candidate.categories }, 'Processing sermon');

  const downloadedPath = await downloadAudio(audio_url, audioDir, {
    timeoutMs: config.http.download_timeout_ms,
    userAgent: config.http.user_agent,
  });

  if (downloadedPath !== filePath) {
    logger.warn(
      { title, derived_path: filePath, downloaded_path: downloadedPath },
      'Downloaded file path differs from derived path, using downloaded path',
    );
    filePath = downloadedPath;
  }

  const record = insertSermon(db, {
    title,
    audio_url,
    file_path: filePath,
    categories: formatCategories(candidate.categories),
  });

  if (!record) {
    logger.info({ title, file_path: filePath }, 'Sermon already exists (detected at insert)');
    if (!existsByFilePath(db, filePath)) {
      await fs.promises.rm(filePath, { force: true });
    }
    return 'duplicate';
  }

  logger.info({ title, id: record.id }, 'Inserted sermon');
  return 'inserted';
}
