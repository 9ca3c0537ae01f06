/**
 * Bounded FIFO with a single async consumer. A full queue overwrites its
 * oldest item, like a circular buffer, and reports the drop to the producer.
 */
export class BoundedQueue<T> implements AsyncIterable<T> {
  readonly capacity: number;
  private items: T[] = [];
  private waiting?: (result: IteratorResult<T, undefined>) => void;
  private closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @returns false when the item was not enqueued as-is: the queue is closed,
   * or it was full and the oldest item was dropped to make room
   */
  push = (item: T): boolean => {
    if (this.closed) {
      return false;
    }

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = undefined;
      resolve({ value: item, done: false });
      return true;
    }

    const full = this.items.length >= this.capacity;
    if (full) {
      this.items.shift();
    }
    this.items.push(item);
    return !full;
  };

  /** Resolves with the oldest item, or done once closed and drained */
  next = (): Promise<IteratorResult<T, undefined>> => {
    if (this.items.length > 0) {
      const [value, ...rest] = this.items;
      this.items = rest;
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => {
      this.waiting = resolve;
    });
  };

  /** Queued items are still delivered; a waiting consumer finishes */
  close = (): void => {
    this.closed = true;
    if (this.waiting && this.items.length === 0) {
      const resolve = this.waiting;
      this.waiting = undefined;
      resolve({ value: undefined, done: true });
    }
  };

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: this.next };
  }
}
