/**
 * Bounded queue with a drop-oldest overflow policy.
 * Uses a circular buffer for O(1) enqueue/dequeue regardless of queue state.
 */

export class BoundedQueue<T> {
  private buffer: (T | undefined)[];
  private head: number; // index of the oldest element
  private tail: number; // index of the next write position
  private count: number;
  private readonly capacity: number;
  private dropped: number;

  constructor(capacity: number = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`BoundedQueue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buffer = new Array<T | undefined>(capacity).fill(undefined);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    this.dropped = 0;
  }

  /**
   * Enqueue an item. If the queue is full the oldest item is dropped and
   * returned so the caller can account for it.
   */
  enqueue(value: T): T | undefined {
    let evicted: T | undefined;

    if (this.count === this.capacity) {
      // Queue full — drop oldest (at head), overwrite with new item
      evicted = this.buffer[this.head];
      this.dropped++;
      this.buffer[this.head] = undefined; // release reference to oldest
      this.head = (this.head + 1) % this.capacity;
      this.count--;
    }

    this.buffer[this.tail] = value;
    this.tail = (this.tail + 1) % this.capacity;
    this.count++;
    return evicted;
  }

  /** Dequeue the next item (FIFO), or undefined if empty. */
  dequeue(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }

    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined; // release reference
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return item;
  }

  /** Items dropped because the queue was full at enqueue time. */
  get droppedCount(): number {
    return this.dropped;
  }

  get size(): number {
    return this.count;
  }
}
