/**
 * Fixed-capacity circular buffer.
 * O(1) push/shift regardless of fill level. Two overflow policies:
 * `push` evicts the oldest entry, `offer` rejects the newest.
 */

export class RingBuffer<T> {
  private buffer: (T | undefined)[];
  private head: number; // index of the oldest element
  private tail: number; // index of the next write position
  private count: number;
  private readonly maxSize: number;
  private evicted: number;
  private rejected: number;

  constructor(maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error(`RingBuffer capacity must be a positive integer, got ${maxSize}`);
    }
    this.maxSize = maxSize;
    this.buffer = new Array<T | undefined>(maxSize).fill(undefined);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    this.evicted = 0;
    this.rejected = 0;
  }

  /**
   * Append an item. If the buffer is full, the oldest item is dropped and
   * returned; otherwise returns undefined.
   */
  push(item: T): T | undefined {
    let dropped: T | undefined;
    if (this.count === this.maxSize) {
      dropped = this.buffer[this.head];
      this.buffer[this.head] = undefined;
      this.head = (this.head + 1) % this.maxSize;
      this.count--;
      this.evicted++;
    }

    this.buffer[this.tail] = item;
    this.tail = (this.tail + 1) % this.maxSize;
    this.count++;
    return dropped;
  }

  /** Append an item only if there is room. Returns false (and counts it) when full. */
  offer(item: T): boolean {
    if (this.count === this.maxSize) {
      this.rejected++;
      return false;
    }
    this.push(item);
    return true;
  }

  /** Remove and return the oldest item, or undefined if empty. */
  shift(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }

    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined; // release reference
    this.head = (this.head + 1) % this.maxSize;
    this.count--;
    return item;
  }

  /** Newest item without removing it. */
  peekLast(): T | undefined {
    if (this.count === 0) return undefined;
    return this.buffer[(this.tail - 1 + this.maxSize) % this.maxSize];
  }

  /** Oldest-first copy of the contents. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(this.head + i) % this.maxSize];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.maxSize;
  }

  get isFull(): boolean {
    return this.count === this.maxSize;
  }

  /** Items dropped by `push` on a full buffer. */
  get evictedCount(): number {
    return this.evicted;
  }

  /** Items refused by `offer` on a full buffer. */
  get rejectedCount(): number {
    return this.rejected;
  }

  /** Drop all items. Counters are cumulative and survive a clear. */
  clear(): void {
    for (let i = 0; i < this.maxSize; i++) {
      this.buffer[i] = undefined;
    }
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }
}
