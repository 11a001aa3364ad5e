import { describe, it, expect, vi, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import { ConfigSchema } from '../../shared/config.js';
import { IngestRunner } from '../runner.js';
import type { IngestFn } from '../runner.js';
import { IngestScheduler } from '../scheduler.js';

const cronMock = vi.hoisted(() => {
  const task = { stop: vi.fn() };
  return {
    task,
    validate: vi.fn((expr: string) => expr !== 'not a cron'),
    schedule: vi.fn((_expr: string, _fn: () => void) => task),
  };
});

vi.mock('node-cron', () => ({ default: cronMock }));

const STATS = {
  source: 'test',
  status: 'completed' as const,
  candidatesFetched: 0,
  inserted: 0,
  duplicates: 0,
  failed: 0,
  sourceUnavailable: false,
  errors: [],
  durationMs: 0,
};

function makeRunner(ingest: IngestFn) {
  const config = ConfigSchema.parse({});
  return new IngestRunner(new Database(':memory:'), config, ingest);
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe('IngestScheduler', () => {
  it('schedules the configured cron expression', () => {
    const ingest = vi.fn<IngestFn>(async () => STATS);
    const scheduler = new IngestScheduler(makeRunner(ingest), { ingest_cron: '*/20 * * * *', run_on_start: false });

    expect(scheduler.start()).toBe(true);
    expect(cronMock.schedule).toHaveBeenCalledWith('*/20 * * * *', expect.any(Function));
    expect(ingest).not.toHaveBeenCalled();
  });

  it('triggers a pass each time the timer fires', async () => {
    const ingest = vi.fn<IngestFn>(async () => STATS);
    const runner = makeRunner(ingest);
    new IngestScheduler(runner, { ingest_cron: '0 * * * *', run_on_start: false }).start();

    const tick = cronMock.schedule.mock.calls[0][1];
    tick();
    await vi.waitFor(() => expect(runner.running).toBe(false));
    tick();
    await vi.waitFor(() => expect(runner.running).toBe(false));

    expect(ingest).toHaveBeenCalledTimes(2);
  });

  it('drops a tick while a pass is still running', () => {
    const ingest = vi.fn<IngestFn>(() => new Promise(() => undefined));
    new IngestScheduler(makeRunner(ingest), { ingest_cron: '0 * * * *', run_on_start: false }).start();

    const tick = cronMock.schedule.mock.calls[0][1];
    tick();
    tick();

    expect(ingest).toHaveBeenCalledTimes(1);
  });

  it('runs once at startup when asked', () => {
    const ingest = vi.fn<IngestFn>(async () => STATS);
    new IngestScheduler(makeRunner(ingest), { ingest_cron: '0 * * * *', run_on_start: true }).start();

    expect(ingest).toHaveBeenCalledTimes(1);
  });

  it('keeps a failing pass from escaping the timer', async () => {
    const ingest = vi.fn<IngestFn>(async () => {
      throw new Error('store gone');
    });
    const runner = makeRunner(ingest);
    new IngestScheduler(runner, { ingest_cron: '0 * * * *', run_on_start: true }).start();

    await vi.waitFor(() => expect(runner.lastFailure).toBe('store gone'));
  });

  it('refuses an invalid expression', () => {
    const scheduler = new IngestScheduler(makeRunner(vi.fn<IngestFn>()), {
      ingest_cron: 'not a cron',
      run_on_start: true,
    });

    expect(scheduler.start()).toBe(false);
    expect(cronMock.schedule).not.toHaveBeenCalled();
  });

  it('stops the cron task', () => {
    const scheduler = new IngestScheduler(makeRunner(vi.fn<IngestFn>()), {
      ingest_cron: '0 * * * *',
      run_on_start: false,
    });
    scheduler.start();
    scheduler.stop();

    expect(cronMock.task.stop).toHaveBeenCalledTimes(1);
  });
});
