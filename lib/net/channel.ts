/**
 * Bounded single-consumer channel between the scan producer and the transport.
 *
 * - `push` resolves immediately while there is room and waits while the buffer
 *   is full (blocking producer).
 * - Once the consumer stops iterating (`return()` on the iterator, e.g. a
 *   `break` or a closed SSE connection) the channel detaches: buffered values are
 *   discarded, waiting producers are released and later pushes are dropped.
 *   The producer keeps running, so a scan still finishes and persists.
 */
export class EventChannel<T extends object> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly spaceWaiters: Array<() => void> = [];
  private dataWaiter: (() => void) | null = null;
  private closed = false;
  private detached = false;
  private iterated = false;

  constructor(private readonly capacity = 64) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new TypeError('Expected `capacity` to be an integer >= 1');
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  /** True once the consumer has gone away. */
  get isDetached(): boolean {
    return this.detached;
  }

  async push(value: T): Promise<void> {
    if (this.closed) throw new Error('channel closed');
    while (!this.detached && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
    }
    if (this.detached) return;
    this.buffer.push(value);
    this.wakeConsumer();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wakeConsumer();
  }

  private wakeConsumer(): void {
    const waiter = this.dataWaiter;
    this.dataWaiter = null;
    waiter?.();
  }

  private releaseProducers(): void {
    for (const resolve of this.spaceWaiters.splice(0)) resolve();
  }

  private detach(): void {
    this.detached = true;
    this.buffer.length = 0;
    this.releaseProducers();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterated) throw new Error('channel supports a single consumer');
    this.iterated = true;
    return {
      next: async (): Promise<IteratorResult<T>> => {
        while (true) {
          if (this.detached) return { done: true, value: undefined };
          const head = this.buffer.shift();
          if (head !== undefined) {
            // one slot freed
            this.spaceWaiters.shift()?.();
            return { done: false, value: head };
          }
          if (this.closed) return { done: true, value: undefined };
          await new Promise<void>((resolve) => {
            this.dataWaiter = resolve;
          });
        }
      },
      return: async (): Promise<IteratorResult<T>> => {
        this.detach();
        return { done: true, value: undefined };
      },
    };
  }

  /** Drain everything until the producer closes the channel. */
  async toArray(): Promise<T[]> {
    const out: T[] = [];
    for await (const v of this) out.push(v);
    return out;
  }
}

export default EventChannel;
