/**
 * Unit tests for frame-queue.ts
 */

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { FrameQueue } from "./frame-queue.js";
import type { FrameHeader, ImageBuffer } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeHeader(seq: number, timestamp?: number): FrameHeader {
  return {
    timestamp: timestamp ?? seq * 33,
    seq,
    width: 2,
    height: 2,
  };
}

function makeImage(id: number): ImageBuffer {
  return { width: 2, height: 2, stride: 2, channels: 1, data: Buffer.from([id, id, id, id]) };
}

// ─── Basic FIFO Behavior ────────────────────────────────────────────────────────

describe("FrameQueue", () => {
  describe("basic enqueue/dequeue FIFO behavior", () => {
    it("dequeues frames in the order they were enqueued", () => {
      const q = new FrameQueue(5);
      q.enqueue(makeHeader(0), makeImage(0));
      q.enqueue(makeHeader(1), makeImage(1));
      q.enqueue(makeHeader(2), makeImage(2));

      expect(q.dequeue()?.header.seq).toBe(0);
      expect(q.dequeue()?.header.seq).toBe(1);
      expect(q.dequeue()?.header.seq).toBe(2);
    });

    it("hands back the same header and image it was given", () => {
      const q = new FrameQueue();
      const header = makeHeader(42, 1400);
      const image = makeImage(99);

      q.enqueue(header, image);
      const result = q.dequeue();

      expect(result?.header).toBe(header);
      expect(result?.image).toBe(image);
      expect(typeof result?.enqueuedAt).toBe("number");
    });

    it("returns null when empty", () => {
      const q = new FrameQueue();
      expect(q.dequeue()).toBeNull();
    });
  });

  // ─── Capacity and Backpressure ────────────────────────────────────────────────

  describe("backpressure", () => {
    it("defaults to a capacity of 8", () => {
      expect(new FrameQueue().capacity).toBe(8);
    });

    it("evicts and returns the oldest frame when full", () => {
      const q = new FrameQueue(2);
      expect(q.enqueue(makeHeader(0), makeImage(0))).toBeNull();
      expect(q.enqueue(makeHeader(1), makeImage(1))).toBeNull();
      const evicted = q.enqueue(makeHeader(2), makeImage(2));

      expect(evicted?.header.seq).toBe(0);
      expect(q.size).toBe(2);
      expect(q.framesDroppedByBackpressure).toBe(1);
      expect(q.dequeue()?.header.seq).toBe(1);
      expect(q.dequeue()?.header.seq).toBe(2);
      expect(q.dequeue()).toBeNull();
    });

    it("keeps the drop counter across clear()", () => {
      const q = new FrameQueue(1);
      q.enqueue(makeHeader(0), makeImage(0));
      q.enqueue(makeHeader(1), makeImage(1));
      q.clear();

      expect(q.size).toBe(0);
      expect(q.dequeue()).toBeNull();
      expect(q.framesDroppedByBackpressure).toBe(1);
    });

    it("works normally after clear()", () => {
      const q = new FrameQueue(3);
      q.enqueue(makeHeader(0), makeImage(0));
      q.enqueue(makeHeader(1), makeImage(1));
      q.dequeue();
      q.clear();
      q.enqueue(makeHeader(7), makeImage(7));

      expect(q.size).toBe(1);
      expect(q.dequeue()?.header.seq).toBe(7);
    });

    it("rejects a size that is not a positive integer", () => {
      expect(() => new FrameQueue(0)).toThrow("FrameQueue size must be a positive integer, got 0");
      expect(() => new FrameQueue(1.5)).toThrow(
        "FrameQueue size must be a positive integer, got 1.5",
      );
    });

    it("always holds the newest min(n, capacity) frames in order", () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 10 }), fc.integer({ min: 0, max: 40 }), (capacity, n) => {
          const q = new FrameQueue(capacity);
          for (let seq = 0; seq < n; seq++) {
            q.enqueue(makeHeader(seq), makeImage(seq % 256));
          }

          const kept = Math.min(n, capacity);
          expect(q.size).toBe(kept);
          expect(q.framesDroppedByBackpressure).toBe(n - kept);

          for (let seq = n - kept; seq < n; seq++) {
            expect(q.dequeue()?.header.seq).toBe(seq);
          }
          expect(q.dequeue()).toBeNull();
        }),
      );
    });
  });
});
