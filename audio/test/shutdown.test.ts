import { describe, it, expect, vi } from 'vitest';
import { GracefulShutdown } from '../src/shutdown.js';

describe('GracefulShutdown', () => {
  it('runs every cleanup once and reports success', async () => {
    const shutdown = new GracefulShutdown({ exit: vi.fn() });
    const first = vi.fn(async () => undefined);
    const second = vi.fn();
    shutdown.add('first', first);
    shutdown.add('second', second);

    await expect(shutdown.shutdown('test')).resolves.toBe(0);
    await expect(shutdown.shutdown('again')).resolves.toBe(0);

    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
    expect(shutdown.isShuttingDown).toBe(true);
  });

  it('keeps going past a failing cleanup and reports failure', async () => {
    const shutdown = new GracefulShutdown();
    const after = vi.fn();
    shutdown.add('broken', () => {
      throw new Error('close failed');
    });
    shutdown.add('after', after);

    await expect(shutdown.shutdown('test')).resolves.toBe(1);
    expect(after).toHaveBeenCalled();
  });

  it('gives up on cleanups that outlive the timeout', async () => {
    vi.useFakeTimers();
    const shutdown = new GracefulShutdown({ timeoutMs: 1000 });
    shutdown.add('stuck', () => new Promise<void>(() => undefined));

    const result = shutdown.shutdown('test');
    await vi.advanceTimersByTimeAsync(1000);

    await expect(result).resolves.toBe(1);
  });

  it('exits with the shutdown result on a signal', async () => {
    const exit = vi.fn();
    const shutdown = new GracefulShutdown({ exit, signals: ['SIGUSR2'] });
    shutdown.install();

    process.emit('SIGUSR2', 'SIGUSR2');
    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));
    shutdown.uninstall();
  });
});
