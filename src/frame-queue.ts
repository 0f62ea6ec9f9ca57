/**
 * Bounded frame mailbox between the capture producer and the warp path.
 * Circular buffer: O(1) enqueue/dequeue; a full queue drops its oldest frame.
 */

import type { FrameHeader, ImageBuffer } from "./types.js";

export interface QueuedFrame {
  header: FrameHeader;
  image: ImageBuffer;
  /** Date.now() at enqueue; the session reports mean queue latency from it. */
  enqueuedAt: number;
}

export class FrameQueue {
  private buffer: (QueuedFrame | null)[];
  private head: number; // index of the oldest element
  private tail: number; // index of the next write position
  private count: number;
  private readonly maxSize: number;
  private droppedByBackpressure: number;

  constructor(maxSize: number = 8) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error(`FrameQueue size must be a positive integer, got ${maxSize}`);
    }
    this.maxSize = maxSize;
    this.buffer = new Array<QueuedFrame | null>(maxSize).fill(null);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    this.droppedByBackpressure = 0;
  }

  /**
   * Add a frame at the tail. When the mailbox is full the oldest frame is
   * evicted, counted as backpressure and returned so the caller can log it.
   */
  enqueue(header: FrameHeader, image: ImageBuffer): QueuedFrame | null {
    let evicted: QueuedFrame | null = null;
    if (this.count === this.maxSize) {
      evicted = this.buffer[this.head];
      this.droppedByBackpressure++;
      this.buffer[this.head] = null;
      this.head = (this.head + 1) % this.maxSize;
      this.count--;
    }

    this.buffer[this.tail] = { header, image, enqueuedAt: Date.now() };
    this.tail = (this.tail + 1) % this.maxSize;
    this.count++;
    return evicted;
  }

  /** Dequeue the next frame (FIFO), or null if empty. */
  dequeue(): QueuedFrame | null {
    if (this.count === 0) {
      return null;
    }

    const frame = this.buffer[this.head];
    this.buffer[this.head] = null;
    this.head = (this.head + 1) % this.maxSize;
    this.count--;
    return frame;
  }

  /** Frames dropped because the queue was full at enqueue time. Cumulative across clear(). */
  get framesDroppedByBackpressure(): number {
    return this.droppedByBackpressure;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.maxSize;
  }

  /** Clear all queued frames and reset queue pointers. */
  clear(): void {
    for (let i = 0; i < this.maxSize; i++) {
      this.buffer[i] = null;
    }
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }
}
