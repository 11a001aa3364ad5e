import type { Db } from '../db/db.js';
import type { Config } from '../shared/config.js';
import type { SourceDescriptor } from '../source/adapter.js';
import type { IngestOptions, IngestStats } from '../source/ingest.js';
import { runIngest } from '../source/ingest.js';
import { sourceFromConfig } from '../source/sources.js';
import { IngestBusyError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type TriggerResult =
  | { started: true; pass: Promise<IngestStats> }
  | { started: false; reason: 'busy' | 'stopped' };

export type IngestFn = (db: Db, config: Config, options: IngestOptions) => Promise<IngestStats>;

/**
 * Guarantees at most one ingestion pass at a time. Timer and on-demand triggers
 * share one runner; a trigger arriving while a pass is in flight is dropped.
 * Passes started by other processes on the same store are kept out by the store's
 * ingest lock, and surface here as an IngestBusyError from the pass.
 */
export class IngestRunner {
  private current: Promise<IngestStats> | null = null;
  private controller: AbortController | null = null;
  private stopped = false;
  private last: IngestStats | null = null;
  private lastError: string | null = null;

  constructor(
    private readonly db: Db,
    private readonly config: Config,
    private readonly ingest: IngestFn = runIngest,
  ) {}

  get running(): boolean {
    return this.current !== null;
  }

  get lastStats(): IngestStats | null {
    return this.last;
  }

  get lastFailure(): string | null {
    return this.lastError;
  }

  trigger(reason: string, source?: SourceDescriptor): TriggerResult {
    if (this.stopped) {
      logger.warn({ reason }, 'Ingest runner stopped, trigger ignored');
      return { started: false, reason: 'stopped' };
    }
    if (this.current) {
      logger.info({ reason }, 'Ingest pass already running, trigger dropped');
      return { started: false, reason: 'busy' };
    }

    const controller = new AbortController();
    this.controller = controller;
    logger.info({ reason }, 'Ingest pass starting');

    const pass = this.ingest(this.db, this.config, {
      source: source ?? sourceFromConfig(this.config),
      signal: controller.signal,
    })
      .then((stats) => {
        this.last = stats;
        this.lastError = null;
        return stats;
      })
      .catch((err: unknown) => {
        if (err instanceof IngestBusyError) {
          logger.info({ reason, error: err.message }, 'Ingest pass skipped, store is busy');
        } else {
          this.lastError = errorMessage(err);
          logger.error({ reason, error: this.lastError }, 'Ingest pass failed');
        }
        throw err;
      })
      .finally(() => {
        this.current = null;
        this.controller = null;
      });

    this.current = pass;
    return { started: true, pass };
  }

  /**
   * Start a pass and wait for it. Throws IngestBusyError if one is already in flight.
   */
  async runNow(reason: string, source?: SourceDescriptor): Promise<IngestStats> {
    const result = this.trigger(reason, source);
    if (!result.started) {
      throw new IngestBusyError(
        result.reason === 'busy' ? 'An ingest pass is already running' : 'Ingest runner is stopped',
      );
    }
    return result.pass;
  }

  /**
   * Refuse further triggers, ask the in-flight pass to stop after its current
   * candidate, and wait for it to settle.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    const pass = this.current;
    if (!pass) return;

    this.controller?.abort();
    // A failed pass was already logged by trigger().
    await Promise.allSettled([pass]);
  }
}
