interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * Unbounded FIFO with blocking `get` and `join`, shaped after a classic
 * thread-safe work queue. Every item handed out by `get` must be acknowledged
 * with `taskDone` for `join` to settle.
 */
export class AsyncTaskQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private joiners: Array<() => void> = [];
  private unfinished = 0;

  get size(): number {
    return this.items.length;
  }

  get pending(): number {
    return this.unfinished;
  }

  put(item: T): void {
    this.unfinished++;
    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  /** Resolves with the next item, or `undefined` once `timeoutMs` elapses. */
  get(timeoutMs?: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }

    return new Promise((resolve) => {
      const waiter: Waiter<T> = { resolve, timer: null };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          resolve(undefined);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  taskDone(): void {
    if (this.unfinished <= 0) {
      throw new Error("taskDone() called more times than there were items");
    }
    this.unfinished--;
    if (this.unfinished === 0) this.settleJoins();
  }

  join(): Promise<void> {
    if (this.unfinished === 0) return Promise.resolve();
    return new Promise((resolve) => this.joiners.push(resolve));
  }

  /** Drops queued items and returns them. */
  clear(): T[] {
    const dropped = this.items.splice(0, this.items.length);
    this.unfinished = Math.max(0, this.unfinished - dropped.length);
    if (this.unfinished === 0) this.settleJoins();
    return dropped;
  }

  private settleJoins(): void {
    const joiners = this.joiners;
    this.joiners = [];
    for (const resolve of joiners) resolve();
  }
}
