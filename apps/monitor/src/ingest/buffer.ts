/**
 * Bounded multi-producer, single-consumer queue between samplers and the
 * batch writer.
 *
 * Backed by a fixed slot array with head/size pointers; `push` and the
 * per-event part of `drain` are O(1). When full, the oldest buffered event is
 * evicted to admit the new one (drop-oldest backpressure) and the `dropped`
 * counter is incremented. Producers never wait.
 *
 * @module
 */

import type { EventSink } from "../capture/sampler.js";
import type { PendingEvent } from "../capture/types.js";
import type { PipelineCounters } from "./counters.js";

export const DEFAULT_BUFFER_CAPACITY = 10_000;

export class IngestionBuffer implements EventSink {
  private readonly slots: Array<PendingEvent | undefined>;
  private readonly _capacity: number;
  private readonly counters: PipelineCounters;

  /** Index of the oldest buffered event. */
  private head = 0;
  private _size = 0;

  private threshold = Number.POSITIVE_INFINITY;
  private thresholdListener: (() => void) | undefined;
  private thresholdScheduled = false;
  private overflowing = false;

  constructor(counters: PipelineCounters, capacity: number = DEFAULT_BUFFER_CAPACITY) {
    if (capacity <= 0 || !Number.isInteger(capacity)) {
      throw new RangeError(`IngestionBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this._capacity = capacity;
    this.counters = counters;
    this.slots = new Array<PendingEvent | undefined>(capacity).fill(undefined);
  }

  get capacity(): number {
    return this._capacity;
  }

  /** Number of events waiting to be drained. */
  get size(): number {
    return this._size;
  }

  /** Current utilization as a fraction [0, 1]. */
  get utilization(): number {
    return this._size / this._capacity;
  }

  /**
   * Register the consumer's wake-up call, fired once `size` reaches `threshold`.
   * The listener runs on a microtask, never inside `push`, so a synchronous
   * burst of producers is never interrupted by a flush.
   */
  onThreshold(threshold: number, listener: () => void): void {
    if (threshold <= 0 || !Number.isInteger(threshold)) {
      throw new RangeError(`threshold must be a positive integer, got ${threshold}`);
    }
    this.threshold = threshold;
    this.thresholdListener = listener;
  }

  push(event: PendingEvent): void {
    this.counters.increment("submitted");

    if (this._size === this._capacity) {
      // Evict the oldest to make room.
      this.slots[this.head] = undefined;
      this.head = (this.head + 1) % this._capacity;
      this._size -= 1;
      this.counters.increment("dropped");
      if (!this.overflowing) {
        this.overflowing = true;
        this.counters.recordFault("BUFFER_OVERFLOW", `ingestion buffer full at ${this._capacity} events`);
      }
    }

    this.slots[(this.head + this._size) % this._capacity] = event;
    this._size += 1;

    if (this._size >= this.threshold && !this.thresholdScheduled && this.thresholdListener) {
      this.thresholdScheduled = true;
      const listener = this.thresholdListener;
      queueMicrotask(() => {
        this.thresholdScheduled = false;
        listener();
      });
    }
  }

  /** Remove and return up to `max` events, oldest first. */
  drain(max: number = this._size): PendingEvent[] {
    const n = Math.min(Math.max(0, Math.floor(max)), this._size);
    const out: PendingEvent[] = [];
    for (let i = 0; i < n; i++) {
      const event = this.slots[this.head];
      this.slots[this.head] = undefined;
      this.head = (this.head + 1) % this._capacity;
      if (event !== undefined) {
        out.push(event);
      }
    }
    this._size -= n;
    if (this._size < this._capacity) {
      this.overflowing = false;
    }
    return out;
  }
}
