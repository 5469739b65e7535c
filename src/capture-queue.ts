/**
 * Ordered hand-off between the capture context and the processing context.
 *
 * Pushes never block and never drop: the circular buffer doubles when full, so
 * a slow consumer only costs memory. `highWaterMark` is a soft bound used for
 * overload reporting. Consumers `await take()`, which waits while the queue is
 * empty and resolves `null` once the queue is closed and drained.
 */

import type { Deferred } from "./types.js";
import { createDeferred } from "./utils/deferred.js";

export interface CaptureQueueOptions {
  /** Depth at which `onHighWater` fires. Default: 256 */
  highWaterMark?: number;
  /** Called once each time the depth rises past the high-water mark. */
  onHighWater?: (size: number) => void;
  /** Initial buffer capacity. Default: 64 */
  initialCapacity?: number;
}

export class CaptureQueue<T> {
  private buffer: (T | undefined)[];
  private head = 0; // index of the oldest element
  private tail = 0; // index of the next write position
  private count = 0;
  private isClosed = false;
  private aboveHighWater = false;
  private overflows = 0;
  private waiters: Deferred<T | null>[] = [];
  private readonly highWaterMark: number;
  private readonly onHighWater?: (size: number) => void;

  constructor(options: CaptureQueueOptions = {}) {
    this.highWaterMark = options.highWaterMark ?? 256;
    this.onHighWater = options.onHighWater;
    this.buffer = new Array<T | undefined>(Math.max(1, options.initialCapacity ?? 64)).fill(undefined);
  }

  /**
   * Enqueue an item. A waiting consumer receives it directly.
   * Ignored once the queue is closed.
   */
  push(item: T): void {
    if (this.isClosed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return;
    }

    if (this.count === this.buffer.length) {
      this.grow();
    }

    this.buffer[this.tail] = item;
    this.tail = (this.tail + 1) % this.buffer.length;
    this.count++;

    if (this.count > this.highWaterMark) {
      if (!this.aboveHighWater) {
        this.aboveHighWater = true;
        this.overflows++;
        this.onHighWater?.(this.count);
      }
    }
  }

  /** Next item in FIFO order; `null` when closed and empty. */
  take(): Promise<T | null> {
    const item = this.poll();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (this.isClosed) {
      return Promise.resolve(null);
    }
    const waiter = createDeferred<T | null>();
    this.waiters.push(waiter);
    return waiter.promise;
  }

  /** Non-waiting dequeue; `undefined` when empty. */
  poll(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }

    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined; // release reference
    this.head = (this.head + 1) % this.buffer.length;
    this.count--;

    if (this.count <= this.highWaterMark) {
      this.aboveHighWater = false;
    }
    return item;
  }

  /**
   * Stop accepting items. Items already queued remain available to `take()`;
   * consumers waiting on an empty queue are released with `null`.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.resolve(null);
    }
  }

  /** Drop every queued item without closing. */
  clear(): void {
    this.buffer.fill(undefined);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    this.aboveHighWater = false;
  }

  get size(): number {
    return this.count;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of times the depth crossed the high-water mark. */
  get overflowEvents(): number {
    return this.overflows;
  }

  private grow(): void {
    const next = new Array<T | undefined>(this.buffer.length * 2).fill(undefined);
    for (let i = 0; i < this.count; i++) {
      next[i] = this.buffer[(this.head + i) % this.buffer.length];
    }
    this.buffer = next;
    this.head = 0;
    this.tail = this.count;
  }
}
