import path from 'node:path';
import { createItem } from '../types.js';
import type { Item } from '../types.js';
import { unsupportedOperation } from './source-adapter.js';
import type { AdapterCapabilities, AdapterContext, SourceAdapter } from './source-adapter.js';
import { isHttpUrl, isYouTubeUrl } from './youtube-url.js';

export const AUDIO_EXTENSIONS = ['.mp3', '.wav', '.ogg', '.flac', '.m4a', '.opus', '.aac', '.webm'];

function titleFromUrl(url: URL): string {
  const segment = url.pathname.split('/').filter(Boolean).pop();
  if (!segment) return url.hostname;

  let name: string;
  try {
    name = decodeURIComponent(segment);
  } catch {
    // not valid percent-encoding
    name = segment;
  }
  const extension = path.posix.extname(name);
  const stem = AUDIO_EXTENSIONS.includes(extension.toLowerCase()) ? name.slice(0, -extension.length) : name;
  return stem.replace(/[_+]+/g, ' ').trim() || url.hostname;
}

/**
 * Plain http(s) media URLs: the URL is both the canonical reference and the
 * stream. Video-site pages belong to the other backends.
 */
export class DirectUrlAdapter implements SourceAdapter {
  readonly name: string;
  readonly kind = 'direct';
  readonly sourceKind = 'DirectUrl';
  readonly capabilities: AdapterCapabilities = { search: false, resolve: true, stream: true };

  constructor(options: { name?: string } = {}) {
    this.name = options.name ?? 'direct';
  }

  search(): Promise<Item[]> {
    return Promise.reject(unsupportedOperation(this.name, 'search'));
  }

  async resolve(url: string, ctx: AdapterContext): Promise<Item | null> {
    if (!this.isValidUrl(url)) return null;
    const parsed = new URL(url);
    return createItem({
      title: titleFromUrl(parsed),
      artist: parsed.hostname,
      canonicalUrl: parsed.toString(),
      sourceKind: this.sourceKind,
      requestedBy: ctx.requestedBy,
    });
  }

  async streamUrl(url: string): Promise<string> {
    if (!this.isValidUrl(url)) {
      throw unsupportedOperation(this.name, `streaming ${url}`);
    }
    return url;
  }

  isValidUrl(url: string): boolean {
    return isHttpUrl(url) && !isYouTubeUrl(url);
  }
}
