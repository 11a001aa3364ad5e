import { createHash, timingSafeEqual } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import { logger } from '../shared/logger.js';

/**
 * Password field of an HTTP Basic `Authorization` header, or null when the header
 * is absent or malformed. The username is not inspected.
 */
export function basicAuthPassword(header: string | undefined): string | null {
  if (!header) return null;
  const match = /^Basic\s+(\S+)$/i.exec(header.trim());
  if (!match?.[1]) return null;

  const decoded = Buffer.from(match[1], 'base64').toString('utf-8');
  const sep = decoded.indexOf(':');
  if (sep === -1) return null;
  return decoded.slice(sep + 1);
}

function sameSecret(a: string, b: string): boolean {
  const da = createHash('sha256').update(a, 'utf8').digest();
  const db = createHash('sha256').update(b, 'utf8').digest();
  return timingSafeEqual(da, db);
}

export function apiKeyAuth(apiKey: string) {
  return createMiddleware(async (c, next) => {
    const password = basicAuthPassword(c.req.header('Authorization'));
    if (!apiKey || password === null || !sameSecret(password, apiKey)) {
      logger.warn({ path: c.req.path }, 'Unauthorized access attempt');
      c.header('WWW-Authenticate', 'Basic realm="sermonkeeper"');
      return c.json({ error: 'Unauthorized: invalid API key' }, 401);
    }
    await next();
  });
}
