#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import type { Config } from '../shared/config.js';
import { getSermonkeeperDir, parseDateParam, resolvePath } from '../shared/utils.js';
import { openDb, closeDb } from '../db/db.js';
import type { Db } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { listSermonsSince } from '../source/sermonDb.js';
import { SourceOverridesSchema, sourceFromConfig } from '../source/sources.js';
import { IngestBusyError } from '../shared/errors.js';
import { IngestRunner } from '../schedule/runner.js';
import { startServer } from '../api/server.js';

const program = new Command();

program
  .name('sermonkeeper')
  .description('Harvest sermon audio from a church website or podcast feed and serve it over HTTP')
  .version('0.1.0');

async function withDb(): Promise<{ db: Db; config: Config; cleanup: () => void }> {
  const config = await loadConfig();
  const db = openDb(resolvePath(config.db.path));
  runMigrations(db);
  return { db, config, cleanup: () => closeDb(db) };
}

// === init ===
program
  .command('init')
  .description('Create config, database and audio directory')
  .action(async () => {
    const configPath = path.join(getSermonkeeperDir(), 'config.yaml');
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const { config, cleanup } = await withDb();
    try {
      fs.mkdirSync(resolvePath(config.audio_dir), { recursive: true });
      log(`✓ database ready at ${resolvePath(config.db.path)}`);
      log(`✓ audio directory ready at ${resolvePath(config.audio_dir)}`);
    } finally {
      cleanup();
    }
  });

// === ingest ===
program
  .command('ingest')
  .description('Run one ingestion pass')
  .option('-s, --source <kind>', 'Source kind: page or feed')
  .option('--feed-url <url>', 'Feed URL (implies --source feed)')
  .option('--max-pages <n>', 'Highest listing page to visit')
  .action(async (opts: { source?: string; feedUrl?: string; maxPages?: string }) => {
    const parsed = SourceOverridesSchema.safeParse({
      source: opts.source,
      feed_url: opts.feedUrl,
      max_pages: opts.maxPages,
    });
    if (!parsed.success) {
      const fields = parsed.error.flatten().fieldErrors;
      if (fields.source) fail(`Unknown source kind: ${opts.source} (expected page or feed)`);
      if (fields.feed_url) fail(`Invalid feed URL: ${opts.feedUrl}`);
      if (fields.max_pages) fail(`Invalid --max-pages: ${opts.maxPages} (expected a positive integer)`);
      return;
    }

    const { db, config, cleanup } = await withDb();
    const runner = new IngestRunner(db, config);
    const onSignal = () => void runner.stop();
    process.once('SIGINT', onSignal);

    try {
      const source = sourceFromConfig(config, {
        kind: parsed.data.source,
        feedUrl: parsed.data.feed_url,
        maxPages: parsed.data.max_pages,
      });
      const stats = await runner.runNow('cli', source);

      log(`Source: ${stats.source}${stats.sourceUnavailable ? ' (unavailable)' : ''}`);
      log(`✓ ${stats.inserted} inserted, ${stats.duplicates} duplicates skipped, ${stats.failed} failed`);
      log(`  ${stats.candidatesFetched} candidates in ${stats.durationMs}ms (${stats.status})`);
      for (const err of stats.errors) {
        log(`  ✗ ${err.audio_url ?? stats.source}: ${err.error}`);
      }
    } catch (err) {
      if (!(err instanceof IngestBusyError)) throw err;
      fail(`Ingest busy: ${err.message}`);
    } finally {
      process.off('SIGINT', onSignal);
      cleanup();
    }
  });

// === list ===
program
  .command('list')
  .description('List sermons fetched on or after a date')
  .requiredOption('-d, --date <date>', 'Date in YYYY-MM-DD format')
  .action(async (opts: { date: string }) => {
    const since = parseDateParam(opts.date);
    if (!since) {
      fail('Invalid date format. Expected format: YYYY-MM-DD');
      return;
    }

    const { db, cleanup } = await withDb();
    try {
      const sermons = listSermonsSince(db, since);
      if (sermons.length === 0) {
        log('No sermons found.');
        return;
      }
      for (const s of sermons) {
        log(`${s.fetched_date}  ${s.id}  ${s.title}  [${s.categories}]`);
      }
    } finally {
      cleanup();
    }
  });

// === server ===
program
  .command('server')
  .description('Start the HTTP API and the ingest scheduler')
  .option('-p, --port <port>', 'Port to listen on')
  .action(async (opts: { port?: string }) => {
    await startServer({ port: opts.port ? parseInt(opts.port, 10) : undefined });
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

function fail(msg: string): void {
  // eslint-disable-next-line no-console
  console.error(msg);
  process.exitCode = 1;
}

program.parseAsync().catch((err: unknown) => {
  fail(err instanceof Error ? err.message : String(err));
});
