import type { WallClock } from "../capture/clock.js";
import { systemWallClock } from "../capture/clock.js";
import type { PipelineCounters } from "../ingest/counters.js";
import type { EventWriteHandle, RetentionPolicy, RetentionResult } from "./types.js";

const US_PER_DAY = 24 * 60 * 60 * 1_000_000;

export const DEFAULT_RETENTION_INTERVAL_MS = 60_000;

export type RetentionPolicyInput = {
  max_age_days?: number;
  max_age_us?: number;
  max_count?: number;
};

/**
 * Validate and normalize a retention policy. At least one bound is required;
 * `max_age_days` is a convenience that converts to `max_age_us`.
 */
export function createRetentionPolicy(input: RetentionPolicyInput): RetentionPolicy {
  if (input.max_age_days !== undefined && input.max_age_us !== undefined) {
    throw new Error("specify max_age_days or max_age_us, not both");
  }

  let maxAgeUs = input.max_age_us;
  if (input.max_age_days !== undefined) {
    if (!Number.isFinite(input.max_age_days) || input.max_age_days < 0) {
      throw new Error("max_age_days must be a non-negative number");
    }
    maxAgeUs = Math.round(input.max_age_days * US_PER_DAY);
  }
  if (maxAgeUs !== undefined && (!Number.isSafeInteger(maxAgeUs) || maxAgeUs < 0)) {
    throw new Error("max_age_us must be a non-negative integer");
  }

  const maxCount = input.max_count;
  if (maxCount !== undefined && (!Number.isSafeInteger(maxCount) || maxCount < 0)) {
    throw new Error("max_count must be a non-negative integer");
  }

  if (maxAgeUs === undefined && maxCount === undefined) {
    throw new Error("retention policy needs max_age or max_count");
  }

  const policy: { max_age_us?: number; max_count?: number } = {};
  if (maxAgeUs !== undefined) policy.max_age_us = maxAgeUs;
  if (maxCount !== undefined) policy.max_count = maxCount;
  return Object.freeze(policy);
}

/** Serialized access to the single write handle (the batch writer provides it). */
export interface WriteAccess {
  withWriteHandle<T>(fn: (handle: EventWriteHandle) => T): Promise<T>;
}

export interface RetentionTaskOptions {
  intervalMs?: number;
  wallClock?: WallClock;
}

/**
 * Periodic retention enforcement. Deletes only committed rows, through the
 * writer's handle so a deletion never interleaves with a batch commit.
 * A failed cycle is counted and logged; the next cycle retries.
 */
export class RetentionTask {
  private policy: RetentionPolicy;
  private readonly access: WriteAccess;
  private readonly counters: PipelineCounters;
  private readonly intervalMs: number;
  private readonly wallClock: WallClock;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<RetentionResult | null> | null = null;

  constructor(
    access: WriteAccess,
    policy: RetentionPolicy,
    counters: PipelineCounters,
    options: RetentionTaskOptions = {},
  ) {
    this.access = access;
    this.policy = policy;
    this.counters = counters;
    this.intervalMs = options.intervalMs ?? DEFAULT_RETENTION_INTERVAL_MS;
    this.wallClock = options.wallClock ?? systemWallClock;
  }

  getPolicy(): RetentionPolicy {
    return this.policy;
  }

  /** Swap the policy; takes effect on the next cycle. */
  updatePolicy(policy: RetentionPolicy): void {
    this.policy = policy;
    console.info("[retention] Policy updated:", policy);
  }

  /** Begin periodic enforcement. Multiple calls are idempotent. */
  start(): void {
    if (this.timer !== null) {
      return;
    }
    this.timer = setInterval(() => {
      // Skip a tick while the previous cycle is still waiting on the writer.
      if (this.inFlight === null) {
        void this.runOnce();
      }
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Run one enforcement cycle. Resolves to the deletion result, or `null` when
   * the cycle failed (the failure is counted, never thrown).
   */
  runOnce(nowUs: number = this.wallClock.nowMicros()): Promise<RetentionResult | null> {
    const policy = this.policy;
    const cycle = this.access
      .withWriteHandle((handle) => handle.enforceRetention(policy, nowUs))
      .then(
        (result) => {
          this.counters.increment("retention_runs");
          const deleted = result.deleted_by_age + result.deleted_by_count;
          this.counters.increment("retention_deleted", deleted);
          if (deleted > 0) {
            console.info(
              `[retention] Deleted ${deleted} event(s) (${result.deleted_by_age} by age, ${result.deleted_by_count} by count); ${result.remaining} remain`,
            );
          }
          return result;
        },
        (err: unknown) => {
          this.counters.increment("retention_failures");
          this.counters.recordFault("RETENTION_FAILURE", err);
          console.warn("[retention] Cycle failed; will retry next interval:", err);
          return null;
        },
      )
      .finally(() => {
        if (this.inFlight === cycle) {
          this.inFlight = null;
        }
      });
    this.inFlight = cycle;
    return cycle;
  }
}
