import Parser from 'rss-parser';
import type { SourceAdapter, FeedSourceDescriptor, CandidateRecord, FetchResult } from './adapter.js';
import { normalizeCandidate } from './adapter.js';
import { SourceUnavailableError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

const parser = new Parser();

/**
 * `<category domain="...">Faith</category>` comes back from the XML parser as
 * `{ _: 'Faith', $: { domain } }` instead of a plain string.
 */
function categoryText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (value !== null && typeof value === 'object' && '_' in value && typeof value._ === 'string') {
    return value._;
  }
  return null;
}

export function isAudioEnclosure(enclosure: Parser.Enclosure | undefined): enclosure is Parser.Enclosure {
  return Boolean(enclosure?.url) && (enclosure?.type ?? '').toLowerCase().startsWith('audio/');
}

export class FeedAdapter implements SourceAdapter<FeedSourceDescriptor> {
  readonly kind = 'feed';

  constructor(
    private readonly timeoutMs: number = 30000,
    private readonly userAgent: string = 'sermonkeeper/1.0',
  ) {}

  async fetch(source: FeedSourceDescriptor): Promise<FetchResult> {
    if (!source.url) {
      throw new SourceUnavailableError('Feed URL is not configured');
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(source.url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/rss+xml, application/xml, text/xml, */*',
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new SourceUnavailableError(`Feed fetch failed: ${response.status} from ${source.url}`, {
          url: source.url,
          status: response.status,
        });
      }

      const xml = await response.text();
      const feed = await parser.parseString(xml);

      const candidates: CandidateRecord[] = [];
      for (const entry of feed.items) {
        if (!isAudioEnclosure(entry.enclosure)) {
          logger.debug({ title: entry.title }, 'Feed item has no audio enclosure, skipping');
          continue;
        }

        let audioUrl: string;
        try {
          audioUrl = new URL(entry.enclosure.url, source.url).href;
        } catch {
          logger.debug({ title: entry.title, url: entry.enclosure.url }, 'Unparseable enclosure URL, skipping');
          continue;
        }

        const categories: unknown[] = entry.categories ?? [];
        candidates.push(
          normalizeCandidate({
            title: entry.title,
            audio_url: audioUrl,
            categories: categories.map(categoryText),
          }),
        );
      }

      logger.debug({ source: source.url, count: candidates.length }, 'Feed fetched');
      return { candidates, documents: 1 };
    } catch (err) {
      if (err instanceof SourceUnavailableError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new SourceUnavailableError(`Feed fetch timed out after ${this.timeoutMs}ms: ${source.url}`, {
          url: source.url,
          timeout: this.timeoutMs,
        });
      }
      throw new SourceUnavailableError(
        `Feed fetch failed: ${err instanceof Error ? err.message : String(err)}`,
        { url: source.url },
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
