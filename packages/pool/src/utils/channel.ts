/**
 * Unbounded (or drop-oldest bounded) FIFO channel with a single async reader.
 *
 * Producers push without waiting. The reader awaits next() or iterates with
 * `for await`. After close(), buffered items are still delivered, then the
 * reader sees the end of the stream.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  /**
   * @param capacity - Maximum buffered items; the oldest is dropped beyond it
   * @param onDrop - Called with each item dropped for capacity
   */
  constructor(
    private readonly capacity = Number.POSITIVE_INFINITY,
    private readonly onDrop?: (item: T) => void
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of buffered items not yet read. */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Appends an item.
   *
   * @returns false if the channel is closed and the item was discarded
   */
  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return true;
    }
    this.buffer.push(item);
    if (this.buffer.length > this.capacity) {
      for (const dropped of this.buffer.splice(0, 1)) this.onDrop?.(dropped);
    }
    return true;
  }

  /**
   * Puts an item back at the head of the queue. Allowed after close() so a
   * reader can return an item it could not handle.
   */
  unshift(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return;
    }
    this.buffer.unshift(item);
  }

  /**
   * Removes buffered items for which `keep` returns false.
   */
  retain(keep: (item: T) => boolean): void {
    const kept = this.buffer.filter(keep);
    this.buffer.splice(0, this.buffer.length, ...kept);
  }

  /**
   * Ends the stream. Pending readers resolve as done.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  /**
   * Waits for the next item. Resolves as done when the channel is closed and
   * drained, or when `signal` aborts while waiting.
   */
  async next(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.splice(0, 1);
      return { value, done: false };
    }
    if (this.closed || signal?.aborted) {
      return { value: undefined, done: true };
    }

    return new Promise<IteratorResult<T, undefined>>((resolve) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        resolve({ value: undefined, done: true });
      };
      const waiter = (result: IteratorResult<T, undefined>): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
