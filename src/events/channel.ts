/** Write side of an {@link EventChannel}. */
export interface EventSink<T> {
  push(event: T): void;
}

/**
 * Unbounded single-consumer queue exposed as an async iterator. Producers push
 * without awaiting; the consumer drains the buffer in order. After
 * {@link close} the remaining buffered events are still delivered before the
 * iteration completes.
 */
export class EventChannel<T> implements AsyncIterable<T>, AsyncIterator<T, void, void>, EventSink<T> {
  private readonly buffer: T[] = [];
  private waiter?: (result: IteratorResult<T, void>) => void;
  private closed = false;

  private static readonly DONE: IteratorReturnResult<void> = Object.freeze({ value: undefined, done: true as const });

  get isClosed(): boolean {
    return this.closed;
  }

  push(event: T): void {
    if (this.closed) {
      return;
    }
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = undefined;
      resolve({ value: event, done: false });
      return;
    }
    this.buffer.push(event);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = undefined;
      resolve(EventChannel.DONE);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, void, void> {
    return this;
  }

  async next(): Promise<IteratorResult<T, void>> {
    const head = this.buffer.shift();
    if (head !== undefined) {
      return { value: head, done: false };
    }
    if (this.closed) {
      return EventChannel.DONE;
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  async return(): Promise<IteratorResult<T, void>> {
    this.buffer.length = 0;
    this.close();
    return EventChannel.DONE;
  }
}
