import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { ConfigSchema } from '../../shared/config.js';
import type { Config } from '../../shared/config.js';
import { IngestRunner } from '../runner.js';
import type { IngestFn } from '../runner.js';
import type { IngestOptions, IngestStats } from '../../source/ingest.js';
import { IngestBusyError } from '../../shared/errors.js';

function statsFor(source: string, overrides: Partial<IngestStats> = {}): IngestStats {
  return {
    source,
    status: 'completed',
    candidatesFetched: 0,
    inserted: 0,
    duplicates: 0,
    failed: 0,
    sourceUnavailable: false,
    errors: [],
    durationMs: 0,
    ...overrides,
  };
}

/** An ingest function whose pass stays open until `release` is called. */
function gatedIngest() {
  let release: (stats: IngestStats) => void = () => undefined;
  let seen: IngestOptions | null = null;
  const ingest = vi.fn<IngestFn>((_db, _config, options) => {
    seen = options;
    return new Promise<IngestStats>((resolve) => {
      release = resolve;
    });
  });
  return {
    ingest,
    release: (stats: IngestStats) => release(stats),
    options: () => seen,
  };
}

let db: Database.Database;
let config: Config;

beforeEach(() => {
  db = new Database(':memory:');
  config = ConfigSchema.parse({
    source: { page: { base_url: 'https://church.test/sermons/page/', max_pages: 5 } },
  });
});

afterEach(() => {
  db.close();
});

describe('IngestRunner', () => {
  it('drops a trigger while a pass is running', async () => {
    const gate = gatedIngest();
    const runner = new IngestRunner(db, config, gate.ingest);

    const first = runner.trigger('schedule');
    const second = runner.trigger('api');

    expect(first.started).toBe(true);
    expect(second).toEqual({ started: false, reason: 'busy' });
    expect(runner.running).toBe(true);
    expect(gate.ingest).toHaveBeenCalledTimes(1);

    gate.release(statsFor('a'));
    if (first.started) await first.pass;
    expect(runner.running).toBe(false);
  });

  it('accepts a new trigger once the previous pass finished', async () => {
    const ingest = vi.fn<IngestFn>(async () => statsFor('a'));
    const runner = new IngestRunner(db, config, ingest);

    await runner.runNow('cli');
    await runner.runNow('cli');

    expect(ingest).toHaveBeenCalledTimes(2);
  });

  it('throws IngestBusyError from runNow while busy', async () => {
    const gate = gatedIngest();
    const runner = new IngestRunner(db, config, gate.ingest);

    const pass = runner.runNow('schedule');
    await expect(runner.runNow('api')).rejects.toBeInstanceOf(IngestBusyError);
    await expect(runner.runNow('api')).rejects.toThrow('An ingest pass is already running');

    gate.release(statsFor('a'));
    await pass;
  });

  it('uses the configured source by default', async () => {
    const gate = gatedIngest();
    const runner = new IngestRunner(db, config, gate.ingest);

    const pass = runner.runNow('schedule');
    expect(gate.options()?.source).toEqual({
      kind: 'page',
      baseUrl: 'https://church.test/sermons/page/',
      maxPages: 5,
    });

    gate.release(statsFor('a'));
    await pass;
  });

  it('passes an explicit source through', async () => {
    const gate = gatedIngest();
    const runner = new IngestRunner(db, config, gate.ingest);

    const pass = runner.runNow('api', { kind: 'feed', url: 'https://church.test/feed.xml' });
    expect(gate.options()?.source).toEqual({ kind: 'feed', url: 'https://church.test/feed.xml' });

    gate.release(statsFor('https://church.test/feed.xml'));
    await pass;
  });

  it('records the last stats and the last failure', async () => {
    const ingest = vi
      .fn<IngestFn>()
      .mockResolvedValueOnce(statsFor('a', { inserted: 3 }))
      .mockRejectedValueOnce(new Error('store gone'))
      .mockResolvedValueOnce(statsFor('a', { inserted: 1 }));
    const runner = new IngestRunner(db, config, ingest);

    await runner.runNow('cli');
    expect(runner.lastStats?.inserted).toBe(3);
    expect(runner.lastFailure).toBeNull();

    await expect(runner.runNow('cli')).rejects.toThrow('store gone');
    expect(runner.lastStats?.inserted).toBe(3);
    expect(runner.lastFailure).toBe('store gone');
    expect(runner.running).toBe(false);

    await runner.runNow('cli');
    expect(runner.lastStats?.inserted).toBe(1);
    expect(runner.lastFailure).toBeNull();
  });

  it('does not record a store-busy pass as a failure', async () => {
    const ingest = vi
      .fn<IngestFn>()
      .mockResolvedValueOnce(statsFor('a', { inserted: 2 }))
      .mockRejectedValueOnce(new IngestBusyError('Another ingest pass holds the store lock'));
    const runner = new IngestRunner(db, config, ingest);

    await runner.runNow('cli');
    await expect(runner.runNow('schedule')).rejects.toThrow('Another ingest pass holds the store lock');

    expect(runner.lastFailure).toBeNull();
    expect(runner.lastStats?.inserted).toBe(2);
    expect(runner.running).toBe(false);
  });

  it('aborts the running pass on stop and refuses later triggers', async () => {
    const gate = gatedIngest();
    const runner = new IngestRunner(db, config, gate.ingest);

    const result = runner.trigger('schedule');
    const signal = gate.options()?.signal;
    expect(signal?.aborted).toBe(false);

    const stopped = runner.stop();
    expect(signal?.aborted).toBe(true);

    gate.release(statsFor('a', { status: 'cancelled' }));
    await stopped;
    if (result.started) await expect(result.pass).resolves.toMatchObject({ status: 'cancelled' });

    expect(runner.trigger('schedule')).toEqual({ started: false, reason: 'stopped' });
    await expect(runner.runNow('api')).rejects.toThrow('Ingest runner is stopped');
  });

  it('stops cleanly when nothing is running', async () => {
    const runner = new IngestRunner(db, config, vi.fn<IngestFn>());
    await expect(runner.stop()).resolves.toBeUndefined();
  });
});
