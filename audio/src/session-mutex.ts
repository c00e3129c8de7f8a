// Per-session mutex serializing queue mutations.
// A Map<sessionId, Promise> acts as a chain: each run() appends to the tail,
// so tasks for one session execute FIFO while other sessions proceed freely.

export type SessionMutexTask<T> = () => Promise<T> | T;

export class SessionMutex {
  private chains = new Map<string, Promise<void>>();

  async run<T>(sessionId: string, task: SessionMutexTask<T>): Promise<T> {
    const prev = this.chains.get(sessionId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });

    const chain = prev.then(() => done);
    this.chains.set(sessionId, chain);

    try {
      await prev;
      return await task();
    } finally {
      release();
      if (this.chains.get(sessionId) === chain) {
        this.chains.delete(sessionId);
      }
    }
  }

  isLocked(sessionId: string): boolean {
    return this.chains.has(sessionId);
  }

  get activeSessions(): number {
    return this.chains.size;
  }
}
