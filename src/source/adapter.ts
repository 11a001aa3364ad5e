export const UNKNOWN_TITLE = 'Unknown Sermon';
export const UNCATEGORIZED = 'Uncategorized';

/**
 * One sermon as described by a source, before identity resolution.
 */
export interface CandidateRecord {
  title: string;
  audio_url: string;
  categories: string[];
}

/**
 * Database row shape for the sermons table.
 */
export interface SermonRecord {
  id: string;
  title: string;
  audio_url: string;
  file_path: string;
  categories: string;
  fetched_date: string;
}

export interface PageSourceDescriptor {
  kind: 'page';
  baseUrl: string;
  maxPages: number;
}

export interface FeedSourceDescriptor {
  kind: 'feed';
  url: string;
}

export type SourceDescriptor = PageSourceDescriptor | FeedSourceDescriptor;

export interface FetchResult {
  candidates: CandidateRecord[];
  /** Number of HTTP documents read (pages for a scrape, 1 for a feed). */
  documents: number;
}

/**
 * Source adapter interface. One implementation per source kind.
 * Throws SourceUnavailableError when the source as a whole cannot be read.
 */
export interface SourceAdapter<D extends SourceDescriptor = SourceDescriptor> {
  readonly kind: D['kind'];
  fetch(source: D): Promise<FetchResult>;
}

export function describeSource(source: SourceDescriptor): string {
  return source.kind === 'page' ? `${source.baseUrl} (pages 1..${source.maxPages})` : source.url;
}

/**
 * Apply the placeholder title and drop blank category names.
 */
export function normalizeCandidate(raw: {
  title?: string | null;
  audio_url: string;
  categories?: ReadonlyArray<string | null | undefined>;
}): CandidateRecord {
  const title = raw.title?.trim();
  const categories = (raw.categories ?? [])
    .map((c) => c?.trim() ?? '')
    .filter((c) => c.length > 0);

  return {
    title: title ? title : UNKNOWN_TITLE,
    audio_url: raw.audio_url.trim(),
    categories,
  };
}

export function formatCategories(categories: readonly string[]): string {
  return categories.length > 0 ? categories.join(', ') : UNCATEGORIZED;
}
