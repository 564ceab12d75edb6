/**
 * Batch writer: the single consumer of the ingestion buffer and the sole owner
 * of the store's write handle.
 *
 * A flush is triggered by whichever comes first: the buffer reaching
 * `batchSize`, or `flushIntervalMs` elapsing. Every flush and every
 * maintenance call runs under one promise-chain lock, so commits happen in
 * drain order and retention never interleaves with a commit.
 *
 * @module
 */

import { generateBatchId } from "@latency-monitor/ids";
import { systemWallClock, type WallClock } from "../capture/clock.js";
import type { PendingEvent } from "../capture/types.js";
import { CommitError } from "../errors.js";
import type { WriteAccess } from "../storage/retention.js";
import type { EventWriteHandle } from "../storage/types.js";
import type { IngestionBuffer } from "./buffer.js";
import type { PipelineCounters } from "./counters.js";

export const DEFAULT_BATCH_SIZE = 500;
export const DEFAULT_FLUSH_INTERVAL_MS = 250;

export interface BatchWriterOptions {
  batchSize?: number;
  flushIntervalMs?: number;
  /** Retries after the first failed attempt, per batch. */
  maxRetries?: number;
  baseBackoffMs?: number;
  maxBackoffMs?: number;
  /** How many times an exhausted batch goes back to the recovery queue before it is discarded. */
  maxRequeues?: number;
  /** Upper bound on batches parked in the recovery queue. */
  recoveryCapacity?: number;
  wallClock?: WallClock;
  sleep?: (ms: number) => Promise<void>;
}

/** Outcome of one committed batch. */
export interface CommitResult {
  readonly batch_id: string;
  readonly count: number;
  readonly first_id: number | null;
  readonly last_id: number | null;
  readonly attempts: number;
}

interface PendingBatch {
  readonly id: string;
  readonly events: readonly PendingEvent[];
  readonly requeues: number;
}

type BatchOutcome = CommitResult | "requeued" | "lost";

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class BatchWriter implements WriteAccess {
  private readonly buffer: IngestionBuffer;
  private readonly handle: EventWriteHandle;
  private readonly counters: PipelineCounters;
  private readonly batchSize: number;
  private readonly flushIntervalMs: number;
  private readonly maxRetries: number;
  private readonly baseBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly maxRequeues: number;
  private readonly recoveryCapacity: number;
  private readonly wallClock: WallClock;
  private readonly sleep: (ms: number) => Promise<void>;

  /** Commit lock: tail of the promise chain every exclusive section joins. */
  private lock: Promise<void> = Promise.resolve();
  private readonly recovery: PendingBatch[] = [];
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;
  private flushQueued = false;
  private released = false;

  constructor(
    buffer: IngestionBuffer,
    handle: EventWriteHandle,
    counters: PipelineCounters,
    options: BatchWriterOptions = {},
  ) {
    this.buffer = buffer;
    this.handle = handle;
    this.counters = counters;
    this.batchSize = positiveInt(options.batchSize ?? DEFAULT_BATCH_SIZE, "batchSize");
    this.flushIntervalMs = positiveInt(options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS, "flushIntervalMs");
    this.maxRetries = options.maxRetries ?? 3;
    this.baseBackoffMs = options.baseBackoffMs ?? 50;
    this.maxBackoffMs = options.maxBackoffMs ?? 2000;
    this.maxRequeues = options.maxRequeues ?? 1;
    this.recoveryCapacity = options.recoveryCapacity ?? 20;
    this.wallClock = options.wallClock ?? systemWallClock;
    this.sleep = options.sleep ?? defaultSleep;

    this.buffer.onThreshold(this.batchSize, () => {
      if (this.running) {
        this.scheduleFlush();
      }
    });
  }

  /** Number of batches waiting in the recovery queue. */
  get recoveryDepth(): number {
    return this.recovery.length;
  }

  /** Start the interval trigger and the batch-size trigger. Idempotent. */
  start(): void {
    if (this.running) {
      return;
    }
    if (this.released) {
      throw new Error("batch writer already closed");
    }
    this.running = true;
    this.timer = setInterval(() => this.scheduleFlush(), this.flushIntervalMs);
    this.timer.unref();
  }

  /**
   * Drain what is buffered right now into batches of at most `batchSize` and
   * commit them in order. Parked recovery batches go first. A batch that is
   * re-queued ends the pass so nothing drained later can commit ahead of it.
   */
  flush(): Promise<CommitResult[]> {
    return this.exclusive(async () => {
      const results: CommitResult[] = [];

      let parked = this.recovery.shift();
      while (parked !== undefined) {
        const outcome = await this.commit(parked);
        if (outcome === "requeued") {
          return results;
        }
        if (outcome !== "lost") {
          results.push(outcome);
        }
        parked = this.recovery.shift();
      }

      let remaining = this.buffer.size;
      while (remaining > 0) {
        const events = this.buffer.drain(Math.min(this.batchSize, remaining));
        if (events.length === 0) {
          break;
        }
        remaining -= events.length;
        const outcome = await this.commit({ id: generateBatchId(), events, requeues: 0 });
        if (outcome === "requeued") {
          break;
        }
        if (outcome !== "lost") {
          results.push(outcome);
        }
      }
      return results;
    });
  }

  /** Run `fn` with the write handle, serialized with batch commits. */
  withWriteHandle<T>(fn: (handle: EventWriteHandle) => T): Promise<T> {
    return this.exclusive(() => {
      if (this.released) {
        throw new Error("batch writer already closed");
      }
      return fn(this.handle);
    });
  }

  /**
   * Stop the triggers and flush until both the buffer and the recovery queue
   * are empty. Events captured before this resolves are committed or counted
   * as lost; none are silently dropped.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    while (this.buffer.size > 0 || this.recovery.length > 0) {
      await this.flush();
    }
    await this.lock;
  }

  /** Stop, then give the write handle back to the store. */
  async close(): Promise<void> {
    await this.stop();
    if (!this.released) {
      this.released = true;
      this.handle.release();
    }
  }

  // ── Private helpers ───────────────────────────────────────────────────

  private scheduleFlush(): void {
    if (this.flushQueued) {
      return;
    }
    this.flushQueued = true;
    this.flush()
      .catch((err: unknown) => {
        console.error("[writer] Flush failed:", err);
      })
      .finally(() => {
        this.flushQueued = false;
      });
  }

  private exclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.lock.then(fn);
    this.lock = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private backoffMs(attempt: number): number {
    return Math.min(this.baseBackoffMs * 2 ** attempt, this.maxBackoffMs);
  }

  private async commit(batch: PendingBatch): Promise<BatchOutcome> {
    let lastError: unknown;
    const attempts = this.maxRetries + 1;

    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        const result = this.handle.appendBatch(batch.events);
        this.counters.recordCommit(result.count, Math.floor(this.wallClock.nowMicros() / 1000));
        return {
          batch_id: batch.id,
          count: result.count,
          first_id: result.first_id,
          last_id: result.last_id,
          attempts: attempt + 1,
        };
      } catch (err) {
        lastError = err;
        this.counters.recordCommitFailure(err);
        if (attempt + 1 < attempts) {
          await this.sleep(this.backoffMs(attempt));
        }
      }
    }

    const error = new CommitError(batch.id, attempts, lastError);
    if (batch.requeues < this.maxRequeues && this.recovery.length < this.recoveryCapacity) {
      this.recovery.unshift({ ...batch, requeues: batch.requeues + 1 });
      this.counters.increment("requeued_batches");
      console.warn(`[writer] ${error.message}; re-queued ${batch.events.length} event(s) for recovery`);
      return "requeued";
    }

    this.counters.increment("lost_batches");
    this.counters.increment("lost_events", batch.events.length);
    this.counters.recordFault("COMMIT_FAILURE", error);
    console.error(`[writer] ${error.message}; discarded ${batch.events.length} event(s)`);
    return "lost";
  }
}

function positiveInt(value: number, name: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}
