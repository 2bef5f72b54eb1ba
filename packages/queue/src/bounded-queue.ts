import { err, ok, type Result } from 'neverthrow';

export interface BoundedQueueOptions {
  /**
   * Maximum number of items held at once. Producers wait while it is reached.
   */
  capacity: number;
}

export class QueueClosedError extends Error {
  constructor() {
    super('Queue is closed');
    this.name = 'QueueClosedError';
  }
}

type PullWaiter<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Async FIFO channel with a fixed capacity.
 *
 * **Guarantees:**
 * - Backpressure: `push` suspends while the queue is full
 * - FIFO ordering: items are pulled in push order
 * - Graceful close: `close()` stops new pushes, queued items are still drained
 */
export class BoundedQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private head = 0;
  private isClosed = false;
  private readonly maxSize: number;
  private readonly pullWaiters: PullWaiter<T>[] = [];
  private readonly spaceWaiters: (() => void)[] = [];

  constructor(options: BoundedQueueOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${String(options.capacity)}`);
    }
    this.maxSize = options.capacity;
  }

  get capacity(): number {
    return this.maxSize;
  }

  get size(): number {
    return this.items.length - this.head;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Enqueue an item, waiting for space while the queue is full.
   * Fails once the queue is closed, including while waiting.
   */
  async push(item: T): Promise<Result<void, QueueClosedError>> {
    while (!this.isClosed && this.size >= this.maxSize) {
      await new Promise<void>((resolve) => {
        this.spaceWaiters.push(resolve);
      });
    }
    if (this.isClosed) {
      return err(new QueueClosedError());
    }

    // A waiting consumer means the queue is empty: hand the item over directly
    const waiter = this.pullWaiters.shift();
    if (waiter) {
      waiter({ done: false, value: item });
    } else {
      this.items.push(item);
    }
    return ok(undefined);
  }

  /**
   * Dequeue the next item, waiting while the queue is empty.
   * Resolves `undefined` once the queue is closed and drained.
   */
  async pull(): Promise<T | undefined> {
    const result = await this.take();
    return result.done ? undefined : result.value;
  }

  /**
   * Signal end of stream. Idempotent.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    // Waiting consumers only exist while the queue is empty
    for (const waiter of this.pullWaiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
    for (const wake of this.spaceWaiters.splice(0)) {
      wake();
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const result = await this.take();
      if (result.done) return;
      yield result.value;
    }
  }

  private take(): Promise<IteratorResult<T, undefined>> {
    if (this.head < this.items.length) {
      const item = this.items[this.head]!;
      this.head++;
      this.compact();
      this.spaceWaiters.shift()?.();
      return Promise.resolve({ done: false, value: item });
    }
    if (this.isClosed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.pullWaiters.push(resolve);
    });
  }

  private compact(): void {
    if (this.head === this.items.length) {
      this.items.length = 0;
      this.head = 0;
    } else if (this.head >= this.maxSize) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
