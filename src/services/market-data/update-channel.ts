/**
 * Bounded FIFO between the dispatch loop and pull consumers.
 *
 * Overflow policy is drop-newest: when `capacity` items are buffered and
 * no consumer is waiting, `push` discards the incoming item and returns false.
 * The producer never blocks.
 */
export class UpdateChannel<T> implements AsyncIterableIterator<T> {
  private buffer: T[] = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;
  private dropped = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return true;
    }
    if (this.buffer.length >= this.capacity) {
      this.dropped += 1;
      return false;
    }
    this.buffer.push(item);
    return true;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  return(): Promise<IteratorResult<T, undefined>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  /** Ends iteration once the buffered items are drained. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get length(): number {
    return this.buffer.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
