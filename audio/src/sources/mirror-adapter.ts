import { componentLogger } from '@strata/logger';
import { BackendProtocolError } from '../errors.js';
import { createItem } from '../types.js';
import type { Item } from '../types.js';
import { buildUrl, fetchJson } from './http.js';
import { mirrorSearchResponseSchema, mirrorVideoResponseSchema } from './schemas.js';
import type { MirrorFormat, MirrorThumbnail } from './schemas.js';
import type { AdapterCapabilities, AdapterContext, FetchLike, SourceAdapter } from './source-adapter.js';
import { canonicalWatchUrl, extractVideoId, isYouTubeUrl } from './youtube-url.js';

const logger = componentLogger('mirror');

export interface MirrorAdapterOptions {
  name?: string;
  instances: string[];
  authToken?: string;
  fetchImpl?: FetchLike;
}

const MIN_THUMBNAIL_WIDTH = 320;

/**
 * Invidious-style mirrors. Each call starts at the next instance in turn and
 * walks the list until one answers.
 */
export class MirrorAdapter implements SourceAdapter {
  readonly name: string;
  readonly kind = 'mirror';
  readonly sourceKind = 'Mirror';
  readonly capabilities: AdapterCapabilities = { search: true, resolve: true, stream: true };

  private readonly fetchImpl: FetchLike;
  private nextInstance = 0;

  constructor(private readonly options: MirrorAdapterOptions) {
    if (options.instances.length === 0) {
      throw new Error('Mirror adapter needs at least one instance');
    }
    this.name = options.name ?? 'mirror';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(query: string, limit: number, ctx: AdapterContext): Promise<Item[]> {
    const results = await this.acrossInstances(ctx, async (instance) => {
      const url = buildUrl(instance, 'api/v1/search', { q: query, type: 'video', sort_by: 'relevance', page: 1 });
      const entries = await fetchJson(this.fetchImpl, url, mirrorSearchResponseSchema, this.requestOptions(ctx));

      return entries.flatMap((entry) => {
        if ((entry.type && entry.type !== 'video') || !entry.videoId || !entry.title) return [];
        return [
          createItem({
            title: entry.title,
            artist: entry.author,
            duration: entry.lengthSeconds,
            thumbnail: pickThumbnail(instance, entry.videoThumbnails),
            canonicalUrl: canonicalWatchUrl(entry.videoId),
            sourceKind: this.sourceKind,
            requestedBy: ctx.requestedBy,
          }),
        ];
      });
    });
    return results.slice(0, limit);
  }

  async resolve(url: string, ctx: AdapterContext): Promise<Item | null> {
    const videoId = extractVideoId(url);
    if (!videoId) return null;

    const [item] = await this.acrossInstances(ctx, async (instance) => {
      const video = await this.fetchVideo(instance, videoId, ctx);
      return [
        createItem({
          title: video.title,
          artist: video.author,
          duration: video.lengthSeconds,
          thumbnail: pickThumbnail(instance, video.videoThumbnails),
          canonicalUrl: canonicalWatchUrl(video.videoId),
          sourceKind: this.sourceKind,
          requestedBy: ctx.requestedBy,
        }),
      ];
    });
    return item ?? null;
  }

  async streamUrl(url: string, ctx: AdapterContext): Promise<string> {
    const videoId = extractVideoId(url);
    if (!videoId) {
      throw new BackendProtocolError(this.name, `not a video URL: ${url}`);
    }

    const [streamUrl] = await this.acrossInstances(ctx, async (instance) => {
      const video = await this.fetchVideo(instance, videoId, ctx);
      const format = pickAudioFormat(video.adaptiveFormats ?? [], video.formatStreams ?? []);
      if (!format) {
        throw new BackendProtocolError(this.name, `no playable format for ${videoId}`);
      }
      return [format.url];
    });
    if (!streamUrl) {
      throw new BackendProtocolError(this.name, `no playable format for ${videoId}`);
    }
    return streamUrl;
  }

  isValidUrl(url: string): boolean {
    return isYouTubeUrl(url);
  }

  /** Index of the instance the next call starts from. */
  get cursor(): number {
    return this.nextInstance;
  }

  private fetchVideo(instance: string, videoId: string, ctx: AdapterContext) {
    return fetchJson(
      this.fetchImpl,
      buildUrl(instance, `api/v1/videos/${videoId}`),
      mirrorVideoResponseSchema,
      this.requestOptions(ctx),
    );
  }

  /**
   * First non-empty answer wins. An empty answer from every instance is an
   * empty result; errors from every instance rethrow the last one.
   */
  private async acrossInstances<T>(ctx: AdapterContext, attempt: (instance: string) => Promise<T[]>): Promise<T[]> {
    const { instances } = this.options;
    const start = this.nextInstance;
    this.nextInstance = (start + 1) % instances.length;

    let lastError: unknown;
    let answered = false;
    for (let offset = 0; offset < instances.length; offset += 1) {
      if (ctx.signal.aborted) throw ctx.signal.reason;
      const instance = instances[(start + offset) % instances.length];
      if (!instance) continue;

      try {
        const results = await attempt(instance);
        answered = true;
        if (results.length > 0) return results;
      } catch (error) {
        if (ctx.signal.aborted) throw ctx.signal.reason;
        lastError = error;
        logger.debug({ instance, error }, 'Mirror instance failed, trying the next one');
      }
    }

    if (!answered && lastError !== undefined) throw lastError;
    return [];
  }

  private requestOptions(ctx: AdapterContext) {
    return {
      signal: ctx.signal,
      headers: this.options.authToken ? { Authorization: `Bearer ${this.options.authToken}` } : undefined,
    };
  }
}

function pickThumbnail(instance: string, thumbnails: MirrorThumbnail[] | undefined): string | undefined {
  if (!thumbnails || thumbnails.length === 0) return undefined;
  const chosen = thumbnails.find((thumbnail) => (thumbnail.width ?? 0) >= MIN_THUMBNAIL_WIDTH) ?? thumbnails[0];
  if (!chosen) return undefined;
  return chosen.url.startsWith('/') ? new URL(chosen.url, instance).toString() : chosen.url;
}

function pickAudioFormat(adaptive: MirrorFormat[], muxed: MirrorFormat[]): MirrorFormat | undefined {
  const audio = adaptive.filter((format) => format.type.startsWith('audio/'));
  return audio.find((format) => format.type.startsWith('audio/mp4')) ?? audio[0] ?? muxed[0];
}
