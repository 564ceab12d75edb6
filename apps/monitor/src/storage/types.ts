import type { Component, LatencyEvent, PendingEvent } from "../capture/types.js";

/** Half-open wall-time range `[start, end)` in microseconds since the epoch. */
export interface TimeRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Retention configuration. At least one bound is set.
 * `max_age_us`: events whose wall stamp is at or before `now - max_age_us` are deleted.
 * `max_count`: rows beyond this cap are evicted oldest first.
 */
export interface RetentionPolicy {
  readonly max_age_us?: number;
  readonly max_count?: number;
}

export interface AppendResult {
  readonly count: number;
  readonly first_id: number | null;
  readonly last_id: number | null;
}

export interface RetentionResult {
  readonly deleted_by_age: number;
  readonly deleted_by_count: number;
  readonly remaining: number;
}

/** Aggregates SQLite can compute in one pass over a range. `sum_us` is a float total. */
export interface RangeTotals {
  readonly count: number;
  readonly sum_us: number;
  readonly min_us: number | null;
  readonly max_us: number | null;
  readonly failures: number;
}

/**
 * The single write path into the store. Exactly one owner holds it at a time;
 * every call is one transaction.
 */
export interface EventWriteHandle {
  appendBatch(events: readonly PendingEvent[]): AppendResult;
  enforceRetention(policy: RetentionPolicy, nowUs: number): RetentionResult;
  release(): void;
}

/** Read path. Runs on its own connection and never touches the write handle. */
export interface EventReader {
  /** Run several reads against one consistent snapshot of committed state. */
  consistent<T>(fn: () => T): T;
  recent(limit: number, component?: Component): LatencyEvent[];
  countInRange(range: TimeRange, component?: Component): number;
  rangeTotals(range: TimeRange, component?: Component): RangeTotals;
  sortedDurations(range: TimeRange, component?: Component): number[];
  iterateDurations(range: TimeRange, component?: Component): IterableIterator<number>;
  exportRange(range: TimeRange, component?: Component): IterableIterator<LatencyEvent>;
  componentsInRange(range: TimeRange): Component[];
  totalCount(): number;
  lastEvent(): LatencyEvent | undefined;
  ping(): boolean;
}
