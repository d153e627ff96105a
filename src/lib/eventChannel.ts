/**
 * Ordered push → pull channel. Values pushed before a consumer asks are
 * buffered; close() ends every pending and future iteration.
 */
export class EventChannel<T extends object> implements AsyncIterable<T> {
  private buffered: T[] = [];
  private waiters: Array<(result: IteratorResult<T>) => void> = [];
  private _closed = false;
  private onClose: Array<() => void> = [];

  get closed(): boolean {
    return this._closed;
  }

  push(value: T): void {
    if (this._closed) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter({ value, done: false });
    else this.buffered.push(value);
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    for (const waiter of this.waiters) waiter({ value: undefined, done: true });
    this.waiters = [];
    for (const fn of this.onClose) fn();
    this.onClose = [];
  }

  /** Runs once when the channel closes (immediately if already closed) */
  whenClosed(fn: () => void): void {
    if (this._closed) fn();
    else this.onClose.push(fn);
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        const head = this.buffered.shift();
        if (head !== undefined) return Promise.resolve({ value: head, done: false });
        if (this._closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise((resolve) => this.waiters.push(resolve));
      },
      return: (): Promise<IteratorResult<T>> => {
        this.buffered = [];
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
