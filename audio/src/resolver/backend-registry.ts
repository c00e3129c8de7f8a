import type { BackendPolicy } from '@strata/config';
import { componentLogger } from '@strata/logger';
import type { SourceAdapter } from '../sources/source-adapter.js';

const logger = componentLogger('backend-registry');

export type BackendConfig = BackendPolicy;

export interface BackendEntry {
  readonly config: Readonly<BackendConfig>;
  readonly adapter: SourceAdapter;
}

interface RegisteredBackend {
  config: BackendConfig;
  adapter: SourceAdapter;
  order: number;
}

/**
 * Operator-facing backend table. The resolver takes a fresh `snapshot()` on
 * every resolution, so changes apply from the next call on.
 */
export class BackendRegistry {
  private readonly backends = new Map<string, RegisteredBackend>();

  constructor(entries: Array<{ config: BackendConfig; adapter: SourceAdapter }> = []) {
    for (const entry of entries) {
      this.register(entry.config, entry.adapter);
    }
  }

  register(config: BackendConfig, adapter: SourceAdapter): void {
    if (this.backends.has(config.name)) {
      throw new Error(`Backend "${config.name}" is already registered`);
    }
    validate(config);
    this.backends.set(config.name, { config: { ...config }, adapter, order: this.backends.size });
  }

  /** Copies of every backend, lowest priority number first, registration order breaking ties. */
  snapshot(): BackendEntry[] {
    return Array.from(this.backends.values())
      .sort((a, b) => a.config.priority - b.config.priority || a.order - b.order)
      .map(({ config, adapter }) => ({ config: Object.freeze({ ...config }), adapter }));
  }

  get(name: string): BackendEntry | undefined {
    const backend = this.backends.get(name);
    return backend ? { config: Object.freeze({ ...backend.config }), adapter: backend.adapter } : undefined;
  }

  setEnabled(name: string, enabled: boolean): void {
    this.update(name, { enabled });
  }

  setTimeout(name: string, timeoutMs: number): void {
    this.update(name, { timeoutMs });
  }

  setMaxRetries(name: string, maxRetries: number): void {
    this.update(name, { maxRetries });
  }

  setPriority(name: string, priority: number): void {
    this.update(name, { priority });
  }

  private update(name: string, changes: Partial<Omit<BackendConfig, 'name' | 'kind'>>): void {
    const backend = this.backends.get(name);
    if (!backend) {
      throw new Error(`Unknown backend "${name}"`);
    }
    const next = { ...backend.config, ...changes };
    validate(next);
    backend.config = next;
    logger.info({ backend: name, changes }, 'Backend configuration changed');
  }
}

function validate(config: BackendConfig): void {
  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    throw new RangeError(`Backend "${config.name}" needs a positive timeout, got ${config.timeoutMs}`);
  }
  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 1) {
    throw new RangeError(`Backend "${config.name}" needs at least one attempt, got ${config.maxRetries}`);
  }
  if (!Number.isFinite(config.priority)) {
    throw new RangeError(`Backend "${config.name}" needs a numeric priority`);
  }
}
