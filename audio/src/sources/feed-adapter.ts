import { componentLogger } from '@strata/logger';
import { BackendProtocolError } from '../errors.js';
import { createItem } from '../types.js';
import type { Item } from '../types.js';
import { buildUrl, fetchText } from './http.js';
import { unsupportedOperation } from './source-adapter.js';
import type { AdapterCapabilities, AdapterContext, FetchLike, SourceAdapter } from './source-adapter.js';
import { canonicalWatchUrl, isYouTubeUrl, parseDuration } from './youtube-url.js';

const logger = componentLogger('feed');

export interface FeedAdapterOptions {
  name?: string;
  baseUrl: string;
  fetchImpl?: FetchLike;
}

const RENDERER_MARKER = '"videoRenderer":{';
const VIDEO_ID = /"videoId":"([a-zA-Z0-9_-]{11})"/;
const TITLE = /"title":\{"runs":\[\{"text":"((?:[^"\\]|\\.)*)"/;
const OWNER = /"(?:ownerText|longBylineText)":\{"runs":\[\{"text":"((?:[^"\\]|\\.)*)"/;
const LENGTH = /"lengthText":\{[^}]*?"simpleText":"([^"]+)"/;

function decodeJsonString(raw: string): string {
  try {
    const decoded: unknown = JSON.parse(`"${raw}"`);
    return typeof decoded === 'string' ? decoded : raw;
  } catch {
    return raw.replace(/\\"/g, '"');
  }
}

export interface ScrapedVideo {
  videoId: string;
  title: string;
  owner?: string;
  duration?: number;
}

/**
 * Pull video entries out of a search-results page. Each `videoRenderer`
 * block is scanned on its own so fields never bleed across results.
 */
export function scrapeSearchPage(html: string): ScrapedVideo[] {
  const blocks = html.split(RENDERER_MARKER).slice(1);
  const seen = new Set<string>();
  const videos: ScrapedVideo[] = [];

  for (const block of blocks) {
    const videoId = VIDEO_ID.exec(block)?.[1];
    const title = TITLE.exec(block)?.[1];
    if (!videoId || !title || seen.has(videoId)) continue;
    seen.add(videoId);

    const owner = OWNER.exec(block)?.[1];
    videos.push({
      videoId,
      title: decodeJsonString(title),
      owner: owner === undefined ? undefined : decodeJsonString(owner),
      duration: parseDuration(LENGTH.exec(block)?.[1]),
    });
  }
  return videos;
}

/** Search by scraping the public results page. No API key, no resolve. */
export class FeedAdapter implements SourceAdapter {
  readonly name: string;
  readonly kind = 'feed';
  readonly sourceKind = 'Feed';
  readonly capabilities: AdapterCapabilities = { search: true, resolve: false, stream: false };

  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: FeedAdapterOptions) {
    this.name = options.name ?? 'feed';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(query: string, limit: number, ctx: AdapterContext): Promise<Item[]> {
    const url = buildUrl(this.options.baseUrl, 'results', { search_query: query });
    const html = await fetchText(this.fetchImpl, url, {
      signal: ctx.signal,
      headers: { 'Accept-Language': 'en-US,en;q=0.9' },
    });

    if (!html.includes('ytInitialData')) {
      throw new BackendProtocolError(this.name, 'results page carries no initial data');
    }

    const videos = scrapeSearchPage(html);
    logger.debug({ query, found: videos.length }, 'Scraped search results page');

    return videos.slice(0, limit).map((video) =>
      createItem({
        title: video.title,
        artist: video.owner,
        duration: video.duration,
        thumbnail: `https://i.ytimg.com/vi/${video.videoId}/hqdefault.jpg`,
        canonicalUrl: canonicalWatchUrl(video.videoId),
        sourceKind: this.sourceKind,
        requestedBy: ctx.requestedBy,
      }),
    );
  }

  resolve(): Promise<Item | null> {
    return Promise.reject(unsupportedOperation(this.name, 'resolve'));
  }

  isValidUrl(url: string): boolean {
    return isYouTubeUrl(url);
  }
}
