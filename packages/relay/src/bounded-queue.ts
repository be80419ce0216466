// Bounded Queue - Fixed-capacity FIFO between one producer task and one consumer task
//
// push() suspends while the queue is full, pop() suspends while it is empty.
// Nothing is ever dropped: a push either lands in the queue or reports that the
// queue was closed.

export const DEFAULT_QUEUE_CAPACITY = 32;

interface Slot<T> {
  value: T;
}

export class BoundedQueue<T> implements AsyncIterable<T> {
  readonly capacity: number;

  private slots: Slot<T>[] = [];
  private closed = false;
  private spaceWaiters: Array<() => void> = [];
  private itemWaiters: Array<(result: IteratorResult<T, undefined>) => void> = [];

  constructor(capacity: number = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.slots.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue a value, waiting for space if the queue is full.
   * Resolves false if the queue was closed before the value could be added.
   */
  async push(value: T): Promise<boolean> {
    while (!this.closed && this.slots.length >= this.capacity) {
      await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
    }
    return this.tryPush(value);
  }

  /** Enqueue without waiting. Returns false when full or closed. */
  tryPush(value: T): boolean {
    if (this.closed) return false;

    // A waiting consumer means the queue is empty: hand the value over directly
    const waiter = this.itemWaiters.shift();
    if (waiter) {
      waiter({ done: false, value });
      return true;
    }

    if (this.slots.length >= this.capacity) return false;
    this.slots.push({ value });
    return true;
  }

  /** Dequeue the oldest value, waiting while empty. Done once closed and drained. */
  pop(): Promise<IteratorResult<T, undefined>> {
    const slot = this.slots.shift();
    if (slot) {
      this.spaceWaiters.shift()?.();
      return Promise.resolve({ done: false, value: slot.value });
    }

    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve) => this.itemWaiters.push(resolve));
  }

  /**
   * Mark the queue closed. Values already queued can still be popped;
   * suspended producers wake and their pushes resolve false.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.itemWaiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
    for (const waiter of this.spaceWaiters.splice(0)) {
      waiter();
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const result = await this.pop();
      if (result.done) return;
      yield result.value;
    }
  }
}
