/**
 * Keyed async mutex. Callers sharing a key run one at a time, in arrival
 * order; different keys never wait on each other.
 */
export class ExecutionLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

export function mediaBuyLockKey(mediaBuyId: string): string {
  return `media_buy:${mediaBuyId}`;
}

/** Tasks that have no media buy yet serialize on their own id. */
export function executionLockKey(mediaBuyId: string | null, taskId: string): string {
  return mediaBuyId ? mediaBuyLockKey(mediaBuyId) : `task:${taskId}`;
}
