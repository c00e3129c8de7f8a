import { describe, it, expect } from 'vitest';
import { SessionMutex } from '../src/session-mutex.js';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('SessionMutex', () => {
  it('runs tasks for one session in submission order', async () => {
    const mutex = new SessionMutex();
    const results: number[] = [];

    const taskResults = await Promise.all([
      mutex.run('s1', async () => {
        await delay(30);
        results.push(1);
        return 'first';
      }),
      mutex.run('s1', async () => {
        await delay(10);
        results.push(2);
        return 'second';
      }),
      mutex.run('s1', () => {
        results.push(3);
        return 'third';
      }),
    ]);

    expect(results).toEqual([1, 2, 3]);
    expect(taskResults).toEqual(['first', 'second', 'third']);
  });

  it('lets different sessions interleave', async () => {
    const mutex = new SessionMutex();
    const results: string[] = [];
    const task = (session: string, id: string, ms: number) => async () => {
      await delay(ms);
      results.push(`${session}-${id}`);
    };

    await Promise.all([
      mutex.run('s1', task('s1', 'a', 30)),
      mutex.run('s2', task('s2', 'a', 5)),
      mutex.run('s1', task('s1', 'b', 1)),
    ]);

    expect(results.filter((r) => r.startsWith('s1'))).toEqual(['s1-a', 's1-b']);
    expect(results[0]).toBe('s2-a');
  });

  it('keeps the chain going after a task throws', async () => {
    const mutex = new SessionMutex();
    const results: string[] = [];

    const first = mutex.run('s1', () => {
      results.push('ok');
      return 'ok';
    });
    const failing = mutex.run('s1', async () => {
      results.push('failing');
      throw new Error('Task failed');
    });
    const after = mutex.run('s1', () => {
      results.push('after');
      return 'after';
    });

    await expect(first).resolves.toBe('ok');
    await expect(failing).rejects.toThrow('Task failed');
    await expect(after).resolves.toBe('after');
    expect(results).toEqual(['ok', 'failing', 'after']);
  });

  it('releases the session once its chain drains', async () => {
    const mutex = new SessionMutex();
    const pending = mutex.run('s1', () => delay(5));

    expect(mutex.isLocked('s1')).toBe(true);
    expect(mutex.activeSessions).toBe(1);

    await pending;
    expect(mutex.isLocked('s1')).toBe(false);
    expect(mutex.activeSessions).toBe(0);
  });

  it('preserves order across many rapid calls', async () => {
    const mutex = new SessionMutex();
    const results: number[] = [];
    const tasks: Promise<number>[] = [];

    for (let i = 0; i < 100; i++) {
      tasks.push(
        mutex.run('s1', async () => {
          results.push(i);
          return i;
        }),
      );
    }

    await Promise.all(tasks);
    expect(results).toEqual(Array.from({ length: 100 }, (_, i) => i));
  });
});
