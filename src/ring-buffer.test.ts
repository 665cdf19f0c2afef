/**
 * Unit tests for ring-buffer.ts
 */

import { describe, it, expect } from "vitest";
import { RingBuffer } from "./ring-buffer.js";

describe("RingBuffer", () => {
  describe("construction", () => {
    it("rejects a zero, negative or fractional capacity", () => {
      expect(() => new RingBuffer<number>(0)).toThrow("positive integer");
      expect(() => new RingBuffer<number>(-3)).toThrow("positive integer");
      expect(() => new RingBuffer<number>(2.5)).toThrow("positive integer");
    });

    it("starts empty", () => {
      const rb = new RingBuffer<number>(4);
      expect(rb.size).toBe(0);
      expect(rb.capacity).toBe(4);
      expect(rb.isFull).toBe(false);
      expect(rb.shift()).toBeUndefined();
      expect(rb.peekLast()).toBeUndefined();
    });
  });

  describe("FIFO behavior", () => {
    it("shifts items in the order they were pushed", () => {
      const rb = new RingBuffer<string>(5);
      rb.push("a");
      rb.push("b");
      rb.push("c");

      expect(rb.shift()).toBe("a");
      expect(rb.shift()).toBe("b");
      expect(rb.shift()).toBe("c");
      expect(rb.shift()).toBeUndefined();
    });

    it("wraps around the backing array", () => {
      const rb = new RingBuffer<number>(3);
      rb.push(1);
      rb.push(2);
      rb.shift();
      rb.shift();
      rb.push(3);
      rb.push(4);
      rb.push(5);

      expect(rb.toArray()).toEqual([3, 4, 5]);
      expect(rb.peekLast()).toBe(5);
    });
  });

  // ─── Overflow: push evicts the oldest ─────────────────────────────────────

  describe("push on a full buffer", () => {
    it("drops and returns the oldest item", () => {
      const rb = new RingBuffer<number>(3);
      expect(rb.push(0)).toBeUndefined();
      rb.push(1);
      rb.push(2);

      expect(rb.push(3)).toBe(0);
      expect(rb.size).toBe(3);
      expect(rb.toArray()).toEqual([1, 2, 3]);
      expect(rb.evictedCount).toBe(1);
    });

    it("keeps only the newest items under sustained overflow", () => {
      const rb = new RingBuffer<number>(2);
      for (let i = 0; i < 10; i++) rb.push(i);

      expect(rb.toArray()).toEqual([8, 9]);
      expect(rb.evictedCount).toBe(8);
    });
  });

  // ─── Overflow: offer rejects the newest ───────────────────────────────────

  describe("offer on a full buffer", () => {
    it("refuses the new item and leaves the contents alone", () => {
      const rb = new RingBuffer<number>(2);
      expect(rb.offer(1)).toBe(true);
      expect(rb.offer(2)).toBe(true);
      expect(rb.offer(3)).toBe(false);

      expect(rb.toArray()).toEqual([1, 2]);
      expect(rb.rejectedCount).toBe(1);
      expect(rb.evictedCount).toBe(0);
    });

    it("accepts again once an item has been shifted", () => {
      const rb = new RingBuffer<number>(1);
      rb.offer(1);
      expect(rb.offer(2)).toBe(false);
      rb.shift();
      expect(rb.offer(3)).toBe(true);
      expect(rb.peekLast()).toBe(3);
    });
  });

  describe("clear", () => {
    it("empties the buffer but keeps the cumulative counters", () => {
      const rb = new RingBuffer<number>(1);
      rb.push(1);
      rb.push(2);
      rb.offer(3);
      rb.clear();

      expect(rb.size).toBe(0);
      expect(rb.toArray()).toEqual([]);
      expect(rb.evictedCount).toBe(1);
      expect(rb.rejectedCount).toBe(1);

      rb.push(7);
      expect(rb.toArray()).toEqual([7]);
    });
  });
});
