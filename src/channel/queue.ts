/**
 * Unbounded FIFO channel between the foreground and the worker.
 *
 * The producer side (`send`) and the non-blocking consumer side (`drain`) are
 * synchronous; `recv` lets an async consumer wait for the next item.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | undefined) => void> = [];
  private isClosed = false;

  /**
   * Enqueue an item. Returns false if the channel is closed.
   */
  send(item: T): boolean {
    if (this.isClosed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Wait for the next item. Resolves undefined once the channel is closed
   * and empty.
   */
  recv(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.isClosed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Take every queued item without waiting
   */
  drain(): T[] {
    if (this.items.length === 0) return [];
    const drained = this.items;
    this.items = [];
    return drained;
  }

  /**
   * Refuse further sends. Queued items stay readable.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(undefined);
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get size(): number {
    return this.items.length;
  }
}
