/**
 * Fixed-capacity FIFO with one asynchronous consumer.
 *
 * Producers never wait: `enqueue` either accepts or rejects immediately
 * (the newest item is the one dropped). The single consumer awaits
 * `dequeue`, which resolves `undefined` once the queue is closed. Items
 * stay in the buffer, and count against capacity, until the consumer
 * actually takes them.
 */
export class BoundedQueue<T extends object> {
  private items: T[] = [];
  private wake: (() => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Current depth, including an item a woken consumer has not taken yet. */
  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  enqueue(item: T): boolean {
    if (this.closed) return false;
    if (this.items.length >= this.capacity) return false;

    this.items.push(item);
    this.signal();
    return true;
  }

  async dequeue(): Promise<T | undefined> {
    for (;;) {
      const next = this.items.shift();
      if (next !== undefined) return next;
      if (this.closed) return undefined;

      if (this.wake) {
        throw new Error('BoundedQueue supports a single consumer');
      }

      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  /**
   * Rejects further items, drops anything still buffered and releases a
   * parked consumer. Returns the number of dropped items.
   */
  close(): number {
    if (this.closed) return 0;
    this.closed = true;

    const dropped = this.items.length;
    this.items = [];
    this.signal();

    return dropped;
  }

  private signal(): void {
    const wake = this.wake;
    if (wake) {
      this.wake = null;
      wake();
    }
  }
}
