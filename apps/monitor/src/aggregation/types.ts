import type { ComponentScope } from "../capture/types.js";

interface SnapshotBase {
  readonly component: ComponentScope;
  /** Inclusive window start, µs since the epoch. */
  readonly window_start: number;
  /** Exclusive window end, µs since the epoch. */
  readonly window_end: number;
}

/** No committed events in the window: statistics are absent, never zero. */
export interface EmptySnapshot extends SnapshotBase {
  readonly count: 0;
}

export interface PopulatedSnapshot extends SnapshotBase {
  readonly count: number;
  readonly mean_us: number;
  readonly p50_us: number;
  readonly p95_us: number;
  readonly p99_us: number;
  readonly min_us: number;
  readonly max_us: number;
  /** Fraction of events with `success = false`. */
  readonly error_rate: number;
  readonly events_per_second: number;
  readonly strategy: "exact" | "histogram";
}

export type AggregateSnapshot = EmptySnapshot | PopulatedSnapshot;

/** An all-component snapshot and its per-component parts, computed together. */
export interface SnapshotBreakdown {
  readonly summary: AggregateSnapshot;
  readonly components: AggregateSnapshot[];
}

export function isPopulated(snapshot: AggregateSnapshot): snapshot is PopulatedSnapshot {
  return snapshot.count > 0;
}
