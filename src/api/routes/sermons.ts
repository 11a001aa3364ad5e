import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { stream } from 'hono/streaming';
import type { AppContext } from '../server.js';
import { listSermonsSince, getSermon } from '../../source/sermonDb.js';
import { parseDateParam } from '../../shared/utils.js';
import { logger } from '../../shared/logger.js';

const AUDIO_TYPES: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.m4a': 'audio/mp4',
  '.aac': 'audio/aac',
  '.ogg': 'audio/ogg',
  '.wav': 'audio/wav',
};

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function sermonRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /sermons?date=YYYY-MM-DD — sermons fetched on or after the date, newest first
  app.get('/sermons', (c) => {
    const dateParam = c.req.query('date');
    if (!dateParam) {
      return c.json({ error: 'Missing date parameter. Expected format: YYYY-MM-DD' }, 400);
    }

    const since = parseDateParam(dateParam);
    if (!since) {
      logger.debug({ date: dateParam }, 'Invalid date parameter');
      return c.json({ error: 'Invalid date format. Expected format: YYYY-MM-DD' }, 400);
    }

    const base = ctx.config.server.public_url?.replace(/\/+$/, '') ?? new URL(c.req.url).origin;
    const sermons = listSermonsSince(ctx.db, since).map((row) => ({
      id: row.id,
      title: row.title,
      audio_url: row.audio_url,
      categories: row.categories,
      fetched_date: row.fetched_date,
      download_url: `${base}/download/${row.id}`,
    }));

    logger.info({ since, count: sermons.length }, 'Listed sermons');
    return c.json(sermons);
  });

  // GET /download/:id — the sermon's audio file as an attachment
  app.get('/download/:id', async (c) => {
    const sermon = getSermon(ctx.db, c.req.param('id'));
    if (!sermon) {
      return c.json({ error: 'Sermon not found' }, 404);
    }

    const stat = await fs.promises.stat(sermon.file_path).catch((err: unknown) => {
      if (isNotFound(err)) return null;
      throw err;
    });
    if (!stat?.isFile()) {
      logger.error({ id: sermon.id, file_path: sermon.file_path }, 'Audio file missing for stored sermon');
      return c.json({ error: 'Audio file not found' }, 404);
    }

    const fileName = path.basename(sermon.file_path);
    c.header('Content-Type', AUDIO_TYPES[path.extname(fileName).toLowerCase()] ?? 'application/octet-stream');
    c.header('Content-Length', String(stat.size));
    c.header('Content-Disposition', `attachment; filename="${fileName.replace(/["\\]/g, '_')}"`);

    logger.info({ id: sermon.id, file_path: sermon.file_path }, 'Serving audio file');
    return stream(c, async (out) => {
      for await (const chunk of fs.createReadStream(sermon.file_path)) {
        await out.write(chunk);
      }
    });
  });

  return app;
}
