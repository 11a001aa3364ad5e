import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { SourceOverridesSchema, sourceFromConfig } from '../../source/sources.js';

const IngestBodySchema = SourceOverridesSchema.extend({
  wait: z.boolean().default(true),
});

export function ingestRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /ingest — on-demand pass through the single-flight runner
  app.post('/ingest', async (c) => {
    const raw: unknown = await c.req.json().catch(() => ({}));
    const parsed = IngestBodySchema.safeParse(raw);
    if (!parsed.success) {
      return c.json({ error: 'Invalid ingest request', errors: parsed.error.flatten().fieldErrors }, 400);
    }

    const body = parsed.data;
    const source = sourceFromConfig(ctx.config, {
      kind: body.source,
      feedUrl: body.feed_url,
      maxPages: body.max_pages,
    });

    if (body.wait) {
      const stats = await ctx.runner.runNow('api', source);
      return c.json(stats);
    }

    const result = ctx.runner.trigger('api', source);
    if (!result.started) {
      return c.json({ error: `Ingest not started: ${result.reason}` }, 409);
    }
    // Failures are logged by the runner and surface through /ingest/status.
    result.pass.catch(() => undefined);
    return c.json({ started: true }, 202);
  });

  // GET /ingest/status — last pass summary
  app.get('/ingest/status', (c) => {
    const last = ctx.runner.lastStats;
    const lastError = ctx.runner.lastFailure;
    if (!last && !lastError) {
      return c.json({ error: 'No ingest has been run yet', running: ctx.runner.running }, 404);
    }
    return c.json({ running: ctx.runner.running, last, last_error: lastError });
  });

  return app;
}
