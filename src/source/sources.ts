import { z } from 'zod';
import type { Config } from '../shared/config.js';
import type { SourceDescriptor, FetchResult } from './adapter.js';
import { FeedAdapter } from './feed.js';
import { PageAdapter } from './page.js';

/**
 * Per-run source overrides as accepted from the command line and `POST /ingest`.
 * `max_pages` arrives as a string from the command line.
 */
export const SourceOverridesSchema = z.object({
  source: z.enum(['page', 'feed']).optional(),
  feed_url: z.string().url().optional(),
  max_pages: z.coerce.number().int().positive().optional(),
});

export type SourceOverrides = z.infer<typeof SourceOverridesSchema>;

/**
 * Source descriptor from configuration, with optional per-run overrides.
 */
export function sourceFromConfig(
  config: Config,
  overrides: { kind?: SourceDescriptor['kind']; feedUrl?: string; maxPages?: number } = {},
): SourceDescriptor {
  const kind = overrides.kind ?? (overrides.feedUrl ? 'feed' : config.source.kind);
  if (kind === 'feed') {
    return { kind: 'feed', url: overrides.feedUrl ?? config.source.feed.url };
  }
  return {
    kind: 'page',
    baseUrl: config.source.page.base_url,
    maxPages: overrides.maxPages ?? config.source.page.max_pages,
  };
}

/**
 * Fetch candidates with the adapter matching the descriptor's kind.
 */
export function fetchSource(config: Config, source: SourceDescriptor): Promise<FetchResult> {
  const { fetch_timeout_ms, user_agent } = config.http;
  if (source.kind === 'feed') {
    return new FeedAdapter(fetch_timeout_ms, user_agent).fetch(source);
  }
  return new PageAdapter(fetch_timeout_ms, user_agent, config.source.page.selectors).fetch(source);
}
