/**
 * Async single-consumer queue over a RingBuffer.
 *
 * Producers never wait: `offer` refuses when full (drop-newest) and `push`
 * evicts the oldest entry (latest-wins). The consumer awaits `take(timeoutMs)`,
 * which wakes on a new item, on timeout, or on `close()`.
 */

import { RingBuffer } from "./ring-buffer.js";

type Waiter = (ready: boolean) => void;

export class BoundedQueue<T> {
  private readonly items: RingBuffer<T>;
  private waiters: Waiter[] = [];
  private closed = false;

  constructor(capacity: number) {
    this.items = new RingBuffer<T>(capacity);
  }

  /** Non-blocking put. Returns false if the queue is full or closed. */
  offer(item: T): boolean {
    if (this.closed) return false;
    const accepted = this.items.offer(item);
    if (accepted) this.wake(true);
    return accepted;
  }

  /** Non-blocking put that evicts the oldest item when full. Returns the evicted item. */
  push(item: T): T | undefined {
    if (this.closed) return undefined;
    const dropped = this.items.push(item);
    this.wake(true);
    return dropped;
  }

  /** Non-blocking get. */
  poll(): T | undefined {
    return this.items.shift();
  }

  /**
   * Wait up to `timeoutMs` for an item. Resolves undefined on timeout or when
   * the queue is closed.
   */
  async take(timeoutMs: number): Promise<T | undefined> {
    const immediate = this.items.shift();
    if (immediate !== undefined || this.closed) return immediate;
    const ready = await this.waitForItem(timeoutMs);
    return ready ? this.items.shift() : undefined;
  }

  /**
   * Resolve true as soon as an item is available (without consuming it), or
   * false on timeout / close.
   */
  waitForItem(timeoutMs: number): Promise<boolean> {
    if (this.items.size > 0) return Promise.resolve(true);
    if (this.closed) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = (ready) => {
        clearTimeout(timer);
        resolve(ready);
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(false);
      }, Math.max(0, timeoutMs));
      this.waiters.push(waiter);
    });
  }

  /** Reject further puts, drop queued items and release every waiter. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.items.clear();
    this.wake(false);
  }

  clear(): void {
    this.items.clear();
  }

  get size(): number {
    return this.items.size;
  }

  get capacity(): number {
    return this.items.capacity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items refused by `offer` because the queue was full. */
  get rejectedCount(): number {
    return this.items.rejectedCount;
  }

  /** Items evicted by `push` because the queue was full. */
  get evictedCount(): number {
    return this.items.evictedCount;
  }

  private wake(ready: boolean): void {
    const pending = this.waiters;
    this.waiters = [];
    for (const waiter of pending) waiter(ready);
  }
}
