/**
 * Bounded task pool. At most `limit` tasks run at once; the rest wait in
 * FIFO order. Used both for node scheduling and for batch work inside nodes.
 */

export class TaskPool {
  readonly limit: number;
  private _active = 0;
  private _queue: Array<() => void> = [];

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`TaskPool limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  get active(): number {
    return this._active;
  }

  get pending(): number {
    return this._queue.length;
  }

  /** Run fn once a slot is free. The slot is released however fn settles. */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /**
   * Apply fn to every item through the pool. Results keep input order.
   * Rejects with the first failure once all started tasks have settled.
   */
  async map<T, R>(items: readonly T[], fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
    const settled = await Promise.allSettled(items.map((item, i) => this.run(() => fn(item, i))));
    const results: R[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'rejected') throw outcome.reason;
      results.push(outcome.value);
    }
    return results;
  }

  private acquire(): Promise<void> {
    if (this._active < this.limit) {
      this._active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      // The releasing task hands its slot over directly.
      this._queue.push(resolve);
    });
  }

  private release(): void {
    const next = this._queue.shift();
    if (next) {
      next();
    } else {
      this._active--;
    }
  }
}
