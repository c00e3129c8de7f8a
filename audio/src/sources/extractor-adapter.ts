import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { componentLogger } from '@strata/logger';
import { BackendProtocolError } from '../errors.js';
import { createItem } from '../types.js';
import type { Item } from '../types.js';
import type { AdapterCapabilities, AdapterContext, SourceAdapter } from './source-adapter.js';
import { canonicalWatchUrl, extractVideoId, isVideoId, isYouTubeUrl } from './youtube-url.js';

const execFileAsync = promisify(execFile);
const logger = componentLogger('extractor');

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  file: string,
  args: string[],
  options: { signal: AbortSignal; timeoutMs?: number },
) => Promise<CommandResult>;

export const execFileRunner: CommandRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    signal: options.signal,
    timeout: options.timeoutMs,
    maxBuffer: 10 * 1024 * 1024,
    encoding: 'utf8',
  });
  return { stdout, stderr };
};

export interface ExtractorAdapterOptions {
  name?: string;
  binary: string;
  socketTimeoutSeconds: number;
  cookiesFile?: string;
  /** Kill the process after this long even if nobody aborts it. */
  processTimeoutMs?: number;
  runner?: CommandRunner;
}

// separator yt-dlp will not find inside a title
const FIELD_SEPARATOR = '\t';
const SEARCH_TEMPLATE = ['%(id)s', '%(title)s', '%(uploader)s', '%(duration)s'].join(FIELD_SEPARATOR);
const RESOLVE_TEMPLATE = ['%(id)s', '%(title)s', '%(uploader)s', '%(duration)s', '%(thumbnail)s'].join(
  FIELD_SEPARATOR,
);

const present = (value: string | undefined): string | undefined =>
  value === undefined || value === '' || value === 'NA' ? undefined : value;

/**
 * Local yt-dlp process. Search goes through `ytsearchN:`, metadata through
 * `--print`, stream URLs through `-f bestaudio --get-url`.
 */
export class ExtractorAdapter implements SourceAdapter {
  readonly name: string;
  readonly kind = 'extractor';
  readonly sourceKind = 'PrimaryExtractor';
  readonly capabilities: AdapterCapabilities = { search: true, resolve: true, stream: true };

  private readonly runner: CommandRunner;

  constructor(private readonly options: ExtractorAdapterOptions) {
    this.name = options.name ?? 'extractor';
    this.runner = options.runner ?? execFileRunner;
  }

  async search(query: string, limit: number, ctx: AdapterContext): Promise<Item[]> {
    const stdout = await this.run(
      ['--print', SEARCH_TEMPLATE, '--flat-playlist', '--default-search', 'ytsearch', `ytsearch${limit}:${query}`],
      ctx,
    );
    return this.parseLines(stdout, ctx.requestedBy).slice(0, limit);
  }

  async resolve(url: string, ctx: AdapterContext): Promise<Item | null> {
    const stdout = await this.run(['--print', RESOLVE_TEMPLATE, '--no-playlist', url], ctx);
    return this.parseLines(stdout, ctx.requestedBy)[0] ?? null;
  }

  async streamUrl(url: string, ctx: AdapterContext): Promise<string> {
    const stdout = await this.run(['-f', 'bestaudio/best', '--get-url', '--no-playlist', url], ctx);
    const streamUrl = stdout
      .split('\n')
      .map((line) => line.trim())
      .find((line) => line.startsWith('http'));
    if (!streamUrl) {
      throw new BackendProtocolError(this.name, `no stream URL printed for ${url}`);
    }
    return streamUrl;
  }

  isValidUrl(url: string): boolean {
    return isYouTubeUrl(url);
  }

  private async run(args: string[], ctx: AdapterContext): Promise<string> {
    const fullArgs = [
      ...args,
      '--skip-download',
      '--quiet',
      '--no-warnings',
      '--socket-timeout',
      String(this.options.socketTimeoutSeconds),
      ...(this.options.cookiesFile ? ['--cookies', this.options.cookiesFile] : []),
    ];

    logger.debug({ binary: this.options.binary, args: fullArgs }, 'Running extractor');
    const { stdout, stderr } = await this.runner(this.options.binary, fullArgs, {
      signal: ctx.signal,
      timeoutMs: this.options.processTimeoutMs,
    });
    if (stderr.trim()) {
      logger.debug({ stderr: stderr.trim().slice(0, 500) }, 'Extractor wrote to stderr');
    }
    return stdout;
  }

  private parseLines(stdout: string, requestedBy: string): Item[] {
    const items: Item[] = [];
    for (const line of stdout.split('\n')) {
      if (!line.trim()) continue;
      const [rawId, title, uploader, duration, thumbnail] = line.split(FIELD_SEPARATOR);
      const id = present(rawId?.trim());
      const videoId = id && isVideoId(id) ? id : id ? extractVideoId(id) : null;
      if (!videoId || !present(title)) {
        logger.warn({ line: line.slice(0, 200) }, 'Skipping malformed extractor line');
        continue;
      }

      const seconds = Number(present(duration) ?? Number.NaN);
      items.push(
        createItem({
          title: title ?? '',
          artist: present(uploader),
          duration: Number.isFinite(seconds) ? Math.round(seconds) : undefined,
          thumbnail: present(thumbnail),
          canonicalUrl: canonicalWatchUrl(videoId),
          sourceKind: this.sourceKind,
          requestedBy,
        }),
      );
    }
    return items;
  }
}
