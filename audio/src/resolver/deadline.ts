import { DeadlineExceededError } from '../errors.js';

/**
 * Run `task` under a hard deadline. When the timer fires the signal handed to
 * the task is aborted and the returned promise rejects with
 * `DeadlineExceededError`, whether or not the task honours the signal.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timeoutHandle: NodeJS.Timeout | undefined;

  const expired = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      const error = new DeadlineExceededError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    // a task that throws synchronously still goes through the race
    const running = Promise.resolve().then(() => task(controller.signal));
    return await Promise.race([running, expired]);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
