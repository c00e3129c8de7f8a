import type { z } from 'zod';
import { HttpStatusError } from '../errors.js';
import type { FetchLike } from './source-adapter.js';

export interface HttpRequestOptions {
  signal: AbortSignal;
  headers?: Record<string, string>;
}

const USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

async function request(fetchImpl: FetchLike, url: string, accept: string, options: HttpRequestOptions) {
  const response = await fetchImpl(url, {
    signal: options.signal,
    headers: { Accept: accept, 'User-Agent': USER_AGENT, ...options.headers },
  });
  if (!response.ok) {
    throw new HttpStatusError(response.status, url);
  }
  return response;
}

/** GET a JSON document and validate it. A body that does not parse throws `SyntaxError`. */
export async function fetchJson<S extends z.ZodTypeAny>(
  fetchImpl: FetchLike,
  url: string,
  schema: S,
  options: HttpRequestOptions,
): Promise<z.output<S>> {
  const response = await request(fetchImpl, url, 'application/json', options);
  const body: unknown = await response.json();
  return schema.parse(body);
}

export async function fetchText(fetchImpl: FetchLike, url: string, options: HttpRequestOptions): Promise<string> {
  const response = await request(fetchImpl, url, 'text/html,*/*', options);
  return response.text();
}

export function buildUrl(base: string, path: string, params: Record<string, string | number | undefined> = {}): string {
  const url = new URL(path, base.endsWith('/') ? base : `${base}/`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}
