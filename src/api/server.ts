import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Db } from '../db/db.js';
import type { Config } from '../shared/config.js';
import { SermonkeeperError, ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { openDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { resolvePath, getSermonkeeperDir } from '../shared/utils.js';
import { IngestRunner } from '../schedule/runner.js';
import { IngestScheduler } from '../schedule/scheduler.js';
import { apiKeyAuth } from './auth.js';
import { sermonRoutes } from './routes/sermons.js';
import { ingestRoutes } from './routes/ingest.js';
import { systemRoutes } from './routes/system.js';

export interface AppContext {
  db: Db;
  config: Config;
  runner: IngestRunner;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  // Everything except /health needs the API key
  const auth = apiKeyAuth(ctx.config.api.key);
  app.use('/sermons', auth);
  app.use('/download/*', auth);
  app.use('/ingest', auth);
  app.use('/ingest/*', auth);

  app.route('/', systemRoutes(ctx));
  app.route('/', sermonRoutes(ctx));
  app.route('/', ingestRoutes(ctx));

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof SermonkeeperError) {
      const status = errorCodeToHttpStatus(err.code);
      logger.error({ code: err.code, error: err.message, path: c.req.path }, 'Request failed');
      return c.json({ error: publicMessage(err), code: err.code }, status);
    }
    logger.error({ error: err.message, stack: err.stack, path: c.req.path }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
      return 400;
    case 'INGEST_BUSY':
      return 409;
    case 'STORE_UNAVAILABLE':
      return 503;
    default:
      return 500;
  }
}

/**
 * Client-facing message. Store and internal failures stay generic.
 */
function publicMessage(err: SermonkeeperError): string {
  switch (err.code) {
    case 'CONFIG_ERROR':
    case 'INGEST_BUSY':
      return err.message;
    case 'STORE_UNAVAILABLE':
      return 'Store unavailable';
    default:
      return 'Internal server error';
  }
}

/**
 * First-run setup: default config file and audio directory. Idempotent.
 */
function autoInit(config: Config): void {
  const configPath = path.join(getSermonkeeperDir(), 'config.yaml');
  if (!process.env['SERMONKEEPER_CONFIG'] && !fs.existsSync(configPath)) {
    writeDefaultConfig(configPath);
    logger.info({ path: configPath }, 'First run: created default config');
  }
  fs.mkdirSync(resolvePath(config.audio_dir), { recursive: true });
}

export async function startServer(opts: { port?: number } = {}): Promise<void> {
  const config = await loadConfig();
  if (!config.api.key) {
    throw new ConfigError('API key is not set. Set api.key in the config file or the API_KEY environment variable.');
  }
  autoInit(config);

  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const db = openDb(resolvePath(config.db.path));
  runMigrations(db);

  const runner = new IngestRunner(db, config);
  const scheduler = new IngestScheduler(runner, config.schedule);
  const app = createApp({ db, config, runner });

  logger.info({ port, host }, 'Starting sermonkeeper server');

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'Server listening');
  });

  scheduler.start();

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...');
    scheduler.stop();
    await runner.stop();
    server.close();
    closeDb(db);
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}
