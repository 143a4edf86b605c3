/**
 * Unbounded single-consumer async channel.
 * Producers `push`; the consumer iterates with `for await`. Closing wakes the
 * consumer and drops anything still queued.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  private _items: T[] = [];
  private _waiters: Array<(r: IteratorResult<T, undefined>) => void> = [];
  private _closed = false;

  get closed(): boolean {
    return this._closed;
  }

  get size(): number {
    return this._items.length;
  }

  push(item: T): boolean {
    if (this._closed) return false;
    const waiter = this._waiters.shift();
    if (waiter) waiter({ done: false, value: item });
    else this._items.push(item);
    return true;
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this._items = [];
    const waiters = this._waiters;
    this._waiters = [];
    for (const w of waiters) w({ done: true, value: undefined });
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this._closed) return Promise.resolve({ done: true, value: undefined });
    if (this._items.length > 0) {
      const value = this._items.shift();
      if (value !== undefined) return Promise.resolve({ done: false, value });
    }
    return new Promise((resolve) => this._waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
