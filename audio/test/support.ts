import type { BackendKind } from '@strata/config';
import type { AdapterCapabilities, AdapterContext, SourceAdapter } from '../src/sources/source-adapter.js';
import { isHttpUrl } from '../src/sources/youtube-url.js';
import { createItem } from '../src/types.js';
import type { Item, SourceKind } from '../src/types.js';

export interface FakeHandlers {
  search?: (query: string, ctx: AdapterContext) => Promise<Item[]> | Item[];
  resolve?: (url: string, ctx: AdapterContext) => Promise<Item | null> | Item | null;
  stream?: (url: string, ctx: AdapterContext) => Promise<string> | string;
}

/** In-process backend whose answers a test scripts per call. */
export class FakeAdapter implements SourceAdapter {
  readonly kind: BackendKind = 'mirror';
  readonly sourceKind: SourceKind = 'Mirror';
  readonly capabilities: AdapterCapabilities;
  readonly searches: string[] = [];
  readonly resolves: string[] = [];
  readonly streams: string[] = [];

  constructor(
    readonly name: string,
    private readonly handlers: FakeHandlers = {},
  ) {
    this.capabilities = {
      search: handlers.search !== undefined,
      resolve: handlers.resolve !== undefined,
      stream: handlers.stream !== undefined,
    };
  }

  async search(query: string, _limit: number, ctx: AdapterContext): Promise<Item[]> {
    this.searches.push(query);
    return this.handlers.search ? this.handlers.search(query, ctx) : [];
  }

  async resolve(url: string, ctx: AdapterContext): Promise<Item | null> {
    this.resolves.push(url);
    return this.handlers.resolve ? this.handlers.resolve(url, ctx) : null;
  }

  async streamUrl(url: string, ctx: AdapterContext): Promise<string> {
    this.streams.push(url);
    return this.handlers.stream ? this.handlers.stream(url, ctx) : '';
  }

  isValidUrl(url: string): boolean {
    return isHttpUrl(url);
  }
}

/** Never settles; only a deadline ends it. */
export const hang = <T>(): Promise<T> => new Promise<T>(() => undefined);

export const track = (id: string, overrides: { title?: string; duration?: number; requestedBy?: string } = {}): Item =>
  createItem({
    title: overrides.title ?? `Track ${id}`,
    duration: overrides.duration ?? 200,
    canonicalUrl: `https://www.youtube.com/watch?v=${id.padEnd(11, '0')}`,
    sourceKind: 'Mirror',
    requestedBy: overrides.requestedBy,
  });

export const idleProbe = { source: 'test', sample: () => 0.1 };
