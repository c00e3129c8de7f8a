import type { BackendKind } from '@strata/config';
import type { Item, SourceKind } from '../types.js';

export interface AdapterCapabilities {
  search: boolean;
  resolve: boolean;
  stream: boolean;
}

export interface AdapterContext {
  signal: AbortSignal;
  requestedBy: string;
}

/**
 * One backend behind a uniform surface. Adapters throw whatever their
 * transport throws; the resolver owns classification, deadlines and retries.
 */
export interface SourceAdapter {
  readonly name: string;
  readonly kind: BackendKind;
  readonly sourceKind: SourceKind;
  readonly capabilities: AdapterCapabilities;

  search(query: string, limit: number, ctx: AdapterContext): Promise<Item[]>;
  resolve(url: string, ctx: AdapterContext): Promise<Item | null>;
  isValidUrl(url: string): boolean;
  streamUrl?(url: string, ctx: AdapterContext): Promise<string>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export function unsupportedOperation(adapter: string, operation: string): Error {
  return new Error(`${adapter} does not support ${operation}`);
}
