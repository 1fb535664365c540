/**
 * Per-key mutual exclusion. Work on one key is serialized; work on
 * different keys never waits on each other.
 */
export class KeyedMutex {
  private _tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve();
    let unlock: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this._tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      unlock();
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this._tails.has(key);
  }

  get size(): number {
    return this._tails.size;
  }
}
