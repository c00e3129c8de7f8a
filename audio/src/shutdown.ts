import { logger } from '@strata/logger';

export type CleanupFunction = () => Promise<void> | void;

export interface GracefulShutdownOptions {
  /** Time the cleanup functions get before the process is forced down. */
  timeoutMs?: number;
  exit?: (code: number) => void;
  signals?: NodeJS.Signals[];
}

/**
 * Runs registered cleanup functions once on SIGTERM / SIGINT, then exits.
 * A failing cleanup is logged and the rest still run.
 */
export class GracefulShutdown {
  private readonly cleanups: Array<{ name: string; fn: CleanupFunction }> = [];
  private shuttingDown = false;
  private readonly timeoutMs: number;
  private readonly exit: (code: number) => void;
  private readonly signals: NodeJS.Signals[];
  private readonly listeners = new Map<NodeJS.Signals, () => void>();

  constructor(options: GracefulShutdownOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.exit = options.exit ?? ((code) => process.exit(code));
    this.signals = options.signals ?? ['SIGTERM', 'SIGINT'];
  }

  add(name: string, fn: CleanupFunction): void {
    this.cleanups.push({ name, fn });
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  install(): void {
    for (const signal of this.signals) {
      const listener = (): void => {
        logger.info({ signal }, 'Received shutdown signal');
        this.shutdown(signal).then(
          (code) => this.exit(code),
          (error: unknown) => {
            logger.error({ error: error instanceof Error ? error.message : String(error), signal }, 'Shutdown failed');
            this.exit(1);
          },
        );
      };
      this.listeners.set(signal, listener);
      process.once(signal, listener);
    }
  }

  uninstall(): void {
    for (const [signal, listener] of this.listeners) {
      process.removeListener(signal, listener);
    }
    this.listeners.clear();
  }

  /** Exit code: 0 when every cleanup finished in time, 1 otherwise. */
  async shutdown(reason: string): Promise<number> {
    if (this.shuttingDown) {
      logger.warn({ reason }, 'Shutdown already in progress');
      return 0;
    }
    this.shuttingDown = true;
    logger.info({ reason, timeout: this.timeoutMs, cleanupFunctions: this.cleanups.length }, 'Starting graceful shutdown');

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), this.timeoutMs);
      timer.unref();
    });

    const run = Promise.all(
      this.cleanups.map(async ({ name, fn }) => {
        try {
          await fn();
          logger.debug({ cleanup: name }, 'Cleanup completed');
          return true;
        } catch (error) {
          logger.error({ cleanup: name, error: error instanceof Error ? error.message : String(error) }, 'Cleanup function failed');
          return false;
        }
      }),
    ).then((results) => ({ timedOut: false, ok: results.every(Boolean) }));

    try {
      const result = await Promise.race([run, timedOut.then(() => ({ timedOut: true, ok: false }))]);
      if (result.timedOut) {
        logger.warn({ timeout: this.timeoutMs }, 'Graceful shutdown timeout reached');
        return 1;
      }
      logger.info({ ok: result.ok }, 'Graceful shutdown completed');
      return result.ok ? 0 : 1;
    } finally {
      clearTimeout(timer);
    }
  }
}
