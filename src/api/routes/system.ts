import { Hono } from 'hono';
import type { AppContext } from '../server.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /health — liveness, no credential required
  app.get('/health', (c) => {
    return c.json({
      status: ctx.db.open ? 'ok' : 'degraded',
      uptime: process.uptime(),
      ingest_running: ctx.runner.running,
    });
  });

  return app;
}
