import { describe, it, expect, vi, afterEach } from "vitest";
import { BoundedQueue } from "./bounded-queue.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("BoundedQueue", () => {
  it("offer never waits and refuses when full", () => {
    const q = new BoundedQueue<number>(2);
    expect(q.offer(1)).toBe(true);
    expect(q.offer(2)).toBe(true);
    expect(q.offer(3)).toBe(false);
    expect(q.size).toBe(2);
    expect(q.rejectedCount).toBe(1);
  });

  it("push evicts the oldest item and returns it", () => {
    const q = new BoundedQueue<string>(2);
    q.push("a");
    q.push("b");
    expect(q.push("c")).toBe("a");
    expect(q.poll()).toBe("b");
    expect(q.poll()).toBe("c");
    expect(q.evictedCount).toBe(1);
  });

  it("take returns a queued item immediately", async () => {
    const q = new BoundedQueue<number>(4);
    q.offer(42);
    await expect(q.take(1000)).resolves.toBe(42);
  });

  it("take wakes as soon as an item is offered", async () => {
    const q = new BoundedQueue<number>(4);
    const pending = q.take(5000);
    q.offer(7);
    await expect(pending).resolves.toBe(7);
  });

  it("take resolves undefined after the timeout", async () => {
    vi.useFakeTimers();
    const q = new BoundedQueue<number>(4);
    const pending = q.take(100);
    await vi.advanceTimersByTimeAsync(100);
    await expect(pending).resolves.toBeUndefined();
  });

  it("waitForItem does not consume the item", async () => {
    const q = new BoundedQueue<number>(4);
    const waiting = q.waitForItem(1000);
    q.offer(5);
    await expect(waiting).resolves.toBe(true);
    expect(q.size).toBe(1);
  });

  describe("close", () => {
    it("releases a waiting consumer with undefined", async () => {
      const q = new BoundedQueue<number>(4);
      const pending = q.take(60_000);
      q.close();
      await expect(pending).resolves.toBeUndefined();
    });

    it("drops queued items and refuses new ones", async () => {
      const q = new BoundedQueue<number>(4);
      q.offer(1);
      q.close();

      expect(q.size).toBe(0);
      expect(q.isClosed).toBe(true);
      expect(q.offer(2)).toBe(false);
      expect(q.push(3)).toBeUndefined();
      await expect(q.waitForItem(1000)).resolves.toBe(false);
    });

    it("is idempotent", () => {
      const q = new BoundedQueue<number>(1);
      q.close();
      expect(() => q.close()).not.toThrow();
    });
  });
});
