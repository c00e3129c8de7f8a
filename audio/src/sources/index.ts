import type { AppConfig, BackendPolicy } from '@strata/config';
import { componentLogger } from '@strata/logger';
import { DirectUrlAdapter } from './direct-url-adapter.js';
import { ExtractorAdapter } from './extractor-adapter.js';
import type { CommandRunner } from './extractor-adapter.js';
import { FeedAdapter } from './feed-adapter.js';
import { MirrorAdapter } from './mirror-adapter.js';
import { PublicApiAdapter } from './public-api-adapter.js';
import type { FetchLike, SourceAdapter } from './source-adapter.js';

export { DirectUrlAdapter } from './direct-url-adapter.js';
export { ExtractorAdapter, execFileRunner } from './extractor-adapter.js';
export type { CommandResult, CommandRunner, ExtractorAdapterOptions } from './extractor-adapter.js';
export { FeedAdapter, scrapeSearchPage } from './feed-adapter.js';
export type { FeedAdapterOptions, ScrapedVideo } from './feed-adapter.js';
export { MirrorAdapter } from './mirror-adapter.js';
export type { MirrorAdapterOptions } from './mirror-adapter.js';
export { PublicApiAdapter } from './public-api-adapter.js';
export type { PublicApiAdapterOptions } from './public-api-adapter.js';
export type { AdapterCapabilities, AdapterContext, FetchLike, SourceAdapter } from './source-adapter.js';
export * from './youtube-url.js';

const logger = componentLogger('sources');

export interface AdapterDependencies {
  fetchImpl?: FetchLike;
  runner?: CommandRunner;
}

type AdapterSettings = Pick<AppConfig, 'extractor' | 'publicApi' | 'mirror' | 'feed'>;

/** Build the adapter a backend policy names. */
export function createSourceAdapter(
  policy: BackendPolicy,
  settings: AdapterSettings,
  deps: AdapterDependencies = {},
): SourceAdapter {
  const kind = policy.kind;
  switch (kind) {
    case 'extractor':
      return new ExtractorAdapter({
        name: policy.name,
        binary: settings.extractor.binary,
        socketTimeoutSeconds: settings.extractor.socketTimeoutSeconds,
        cookiesFile: settings.extractor.cookiesFile,
        // backstop for a process that ignores the abort signal
        processTimeoutMs: policy.timeoutMs * 2,
        runner: deps.runner,
      });
    case 'public-api':
      if (!settings.publicApi.apiKey) {
        logger.warn({ backend: policy.name }, 'Public API backend created without an API key');
      }
      return new PublicApiAdapter({
        name: policy.name,
        apiKey: settings.publicApi.apiKey ?? '',
        baseUrl: settings.publicApi.baseUrl,
        fetchImpl: deps.fetchImpl,
      });
    case 'mirror':
      return new MirrorAdapter({
        name: policy.name,
        instances: settings.mirror.instances,
        authToken: settings.mirror.authToken,
        fetchImpl: deps.fetchImpl,
      });
    case 'feed':
      return new FeedAdapter({ name: policy.name, baseUrl: settings.feed.baseUrl, fetchImpl: deps.fetchImpl });
    case 'direct':
      return new DirectUrlAdapter({ name: policy.name });
    default: {
      const unreachable: never = kind;
      throw new Error(`Unknown backend kind: ${String(unreachable)}`);
    }
  }
}

export function createSourceAdapters(
  policies: BackendPolicy[],
  settings: AdapterSettings,
  deps: AdapterDependencies = {},
): SourceAdapter[] {
  return policies.map((policy) => createSourceAdapter(policy, settings, deps));
}
