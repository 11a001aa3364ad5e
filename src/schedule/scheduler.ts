/**
 * Scheduler: node-cron timer that triggers ingest passes through the
 * single-flight runner. Started by `sermonkeeper server`.
 */

import cron from 'node-cron';
import type { Config } from '../shared/config.js';
import type { IngestRunner } from './runner.js';
import { logger } from '../shared/logger.js';

export class IngestScheduler {
  private task: cron.ScheduledTask | null = null;

  constructor(
    private readonly runner: IngestRunner,
    private readonly schedule: Pick<Config['schedule'], 'ingest_cron' | 'run_on_start'>,
  ) {}

  start(): boolean {
    const expression = this.schedule.ingest_cron;
    if (!cron.validate(expression)) {
      logger.warn({ ingest_cron: expression }, 'Invalid ingest_cron expression, skipping scheduler');
      return false;
    }

    this.task = cron.schedule(expression, () => {
      this.fire('schedule');
    });

    if (this.schedule.run_on_start) {
      this.fire('startup');
    }

    logger.info({ ingest_cron: expression }, 'Scheduler started');
    return true;
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
    logger.info('Scheduler stopped');
  }

  private fire(reason: string): void {
    const result = this.runner.trigger(reason);
    if (result.started) {
      // Failures are logged by the runner; keep the rejection from going unhandled.
      result.pass.catch(() => undefined);
    }
  }
}
