interface Putter<T> {
  item: T;
  resolve: () => void;
  reject: (e: Error) => void;
}

/**
 * Fixed-capacity FIFO between one producer callback and one consuming loop.
 * `push` settles once the item fits, so a full channel holds the producer back.
 */
export class BoundedChannel<T extends object> implements AsyncIterable<T> {
  readonly #capacity: number;
  readonly #items: T[] = [];
  readonly #takers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  readonly #putters: Array<Putter<T>> = [];
  #closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError(`channel capacity must be a positive integer, got ${capacity}`);
    this.#capacity = capacity;
  }

  get size(): number {
    return this.#items.length;
  }

  get closed(): boolean {
    return this.#closed;
  }

  push(item: T): Promise<void> {
    if (this.#closed) return Promise.reject(new Error('channel closed'));
    const taker = this.#takers.shift();
    if (taker) {
      taker({ value: item, done: false });
      return Promise.resolve();
    }
    if (this.#items.length < this.#capacity) {
      this.#items.push(item);
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.#putters.push({ item, resolve, reject });
    });
  }

  take(): Promise<IteratorResult<T, undefined>> {
    const item = this.#items.shift();
    if (item !== undefined) {
      const putter = this.#putters.shift();
      if (putter) {
        this.#items.push(putter.item);
        putter.resolve();
      }
      return Promise.resolve({ value: item, done: false });
    }
    if (this.#closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.#takers.push(resolve);
    });
  }

  /** Items already accepted stay readable; blocked producers are rejected. */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    for (const taker of this.#takers.splice(0)) taker({ value: undefined, done: true });
    for (const putter of this.#putters.splice(0)) putter.reject(new Error('channel closed'));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.take() };
  }
}
