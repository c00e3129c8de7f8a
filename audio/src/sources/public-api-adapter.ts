import { createItem } from '../types.js';
import type { Item } from '../types.js';
import { buildUrl, fetchJson } from './http.js';
import { apiSearchResponseSchema, apiVideosResponseSchema } from './schemas.js';
import type { ApiThumbnails } from './schemas.js';
import type { AdapterCapabilities, AdapterContext, FetchLike, SourceAdapter } from './source-adapter.js';
import { canonicalWatchUrl, extractVideoId, isYouTubeUrl, parseDuration } from './youtube-url.js';

export interface PublicApiAdapterOptions {
  name?: string;
  apiKey: string;
  baseUrl: string;
  fetchImpl?: FetchLike;
}

// the API caps maxResults at 50
const MAX_RESULTS = 50;

const pickThumbnail = (thumbnails: ApiThumbnails): string | undefined =>
  thumbnails?.high?.url ?? thumbnails?.medium?.url ?? thumbnails?.default?.url;

/**
 * YouTube Data API v3. Search costs one `search.list` call plus one
 * `videos.list` call for durations, which the search endpoint omits.
 */
export class PublicApiAdapter implements SourceAdapter {
  readonly name: string;
  readonly kind = 'public-api';
  readonly sourceKind = 'PublicAPI';
  readonly capabilities: AdapterCapabilities = { search: true, resolve: true, stream: false };

  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: PublicApiAdapterOptions) {
    this.name = options.name ?? 'public-api';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(query: string, limit: number, ctx: AdapterContext): Promise<Item[]> {
    const searchUrl = buildUrl(this.options.baseUrl, 'search', {
      part: 'snippet',
      q: query,
      type: 'video',
      maxResults: Math.min(limit, MAX_RESULTS),
      videoEmbeddable: 'true',
      videoSyndicated: 'true',
      order: 'relevance',
      key: this.options.apiKey,
    });
    const response = await fetchJson(this.fetchImpl, searchUrl, apiSearchResponseSchema, { signal: ctx.signal });

    const hits = response.items.flatMap((entry) =>
      entry.id.videoId ? [{ videoId: entry.id.videoId, snippet: entry.snippet }] : [],
    );
    if (hits.length === 0) return [];

    const durations = await this.fetchDurations(
      hits.map((hit) => hit.videoId),
      ctx,
    );

    return hits.map(({ videoId, snippet }) =>
      createItem({
        title: snippet.title,
        artist: snippet.channelTitle,
        duration: durations.get(videoId),
        thumbnail: pickThumbnail(snippet.thumbnails),
        canonicalUrl: canonicalWatchUrl(videoId),
        sourceKind: this.sourceKind,
        requestedBy: ctx.requestedBy,
      }),
    );
  }

  async resolve(url: string, ctx: AdapterContext): Promise<Item | null> {
    const videoId = extractVideoId(url);
    if (!videoId) return null;

    const response = await fetchJson(
      this.fetchImpl,
      buildUrl(this.options.baseUrl, 'videos', {
        part: 'snippet,contentDetails',
        id: videoId,
        key: this.options.apiKey,
      }),
      apiVideosResponseSchema,
      { signal: ctx.signal },
    );

    const video = response.items[0];
    if (!video?.snippet) return null;

    return createItem({
      title: video.snippet.title,
      artist: video.snippet.channelTitle,
      duration: parseDuration(video.contentDetails?.duration),
      thumbnail: pickThumbnail(video.snippet.thumbnails),
      canonicalUrl: canonicalWatchUrl(videoId),
      sourceKind: this.sourceKind,
      requestedBy: ctx.requestedBy,
    });
  }

  isValidUrl(url: string): boolean {
    return isYouTubeUrl(url);
  }

  private async fetchDurations(videoIds: string[], ctx: AdapterContext): Promise<Map<string, number>> {
    const response = await fetchJson(
      this.fetchImpl,
      buildUrl(this.options.baseUrl, 'videos', {
        part: 'contentDetails',
        id: videoIds.join(','),
        key: this.options.apiKey,
      }),
      apiVideosResponseSchema,
      { signal: ctx.signal },
    );

    const durations = new Map<string, number>();
    for (const video of response.items) {
      const seconds = parseDuration(video.contentDetails?.duration);
      if (seconds !== undefined) durations.set(video.id, seconds);
    }
    return durations;
  }
}
