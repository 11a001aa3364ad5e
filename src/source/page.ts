import { JSDOM } from 'jsdom';
import type { SourceAdapter, PageSourceDescriptor, CandidateRecord, FetchResult } from './adapter.js';
import { normalizeCandidate } from './adapter.js';
import type { PageSelectors } from '../shared/config.js';
import { BROWSER_USER_AGENT, generateDefaultConfig } from '../shared/config.js';
import { SourceUnavailableError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_SELECTORS: PageSelectors = generateDefaultConfig().source.page.selectors;

export function pageUrl(baseUrl: string, page: number): string {
  return `${baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`}${page}/`;
}

/**
 * Extract sermon candidates from one listing page.
 * Blocks without an audio source are dropped.
 */
export function parseSermonPage(
  html: string,
  url: string,
  selectors: PageSelectors = DEFAULT_SELECTORS,
): CandidateRecord[] {
  const dom = new JSDOM(html, { url });
  const doc = dom.window.document;
  const candidates: CandidateRecord[] = [];

  for (const block of Array.from(doc.querySelectorAll(selectors.item))) {
    const src = block.querySelector(selectors.audio)?.getAttribute('src')?.trim();
    if (!src) continue;

    let audioUrl: string;
    try {
      audioUrl = new URL(src, url).href;
    } catch {
      logger.debug({ src, page: url }, 'Unparseable audio src, skipping');
      continue;
    }

    candidates.push(
      normalizeCandidate({
        title: block.querySelector(selectors.title)?.textContent,
        audio_url: audioUrl,
        categories: Array.from(block.querySelectorAll(selectors.category)).map((a) => a.textContent),
      }),
    );
  }

  return candidates;
}

export class PageAdapter implements SourceAdapter<PageSourceDescriptor> {
  readonly kind = 'page';

  constructor(
    private readonly timeoutMs: number = 30000,
    private readonly userAgent: string = BROWSER_USER_AGENT,
    private readonly selectors: PageSelectors = DEFAULT_SELECTORS,
  ) {}

  /**
   * Walk pages 1..maxPages. A non-200 or empty page ends the listing and whatever was
   * collected so far is returned. Only a transport failure on the first page makes the
   * whole source unavailable.
   */
  async fetch(source: PageSourceDescriptor): Promise<FetchResult> {
    const candidates: CandidateRecord[] = [];
    let documents = 0;

    for (let page = 1; page <= source.maxPages; page++) {
      const url = pageUrl(source.baseUrl, page);
      logger.info({ page, url }, 'Fetching listing page');

      let html: string | null;
      try {
        html = await this.fetchPage(url);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        if (page === 1) {
          throw new SourceUnavailableError(`Listing fetch failed: ${message}`, { url });
        }
        logger.warn({ page, url, error: message }, 'Listing page request failed, stopping');
        break;
      }

      if (html === null) break;
      documents++;

      const found = parseSermonPage(html, url, this.selectors);
      if (found.length === 0) {
        logger.info({ page }, 'No more sermons found, stopping');
        break;
      }
      candidates.push(...found);
    }

    return { candidates, documents };
  }

  /**
   * Returns null for a non-200 response, which marks the end of the listing.
   */
  private async fetchPage(url: string): Promise<string | null> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.9',
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (response.status !== 200) {
        logger.warn({ url, status: response.status }, 'Listing page returned non-200, stopping');
        return null;
      }
      return await response.text();
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new Error(`Request timed out after ${this.timeoutMs}ms`);
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}
