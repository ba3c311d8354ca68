/**
 * Unbounded FIFO queue connecting the worker's server loop and control loop.
 *
 * `put` never waits. `get` resolves with the oldest item, waiting for one if
 * the queue is empty; with a timeout it resolves `undefined` when none arrived.
 */

interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];

  get size(): number {
    return this.items.length;
  }

  put(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  /** Oldest item, or undefined when the queue is empty */
  getNowait(): T | undefined {
    return this.items.shift();
  }

  get(): Promise<T>;
  get(timeoutMs: number): Promise<T | undefined>;
  get(timeoutMs?: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }

    return new Promise<T | undefined>((resolve) => {
      const waiter: Waiter<T> = { resolve, timer: null };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(undefined);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /** Remove and return everything currently queued */
  drain(): T[] {
    const items = this.items;
    this.items = [];
    return items;
  }
}
