/**
 * Aggregation over committed events in a time window.
 *
 * Every snapshot is computed from one read transaction, so totals and
 * percentiles describe the same set of rows even while the writer commits.
 * Small windows are sorted in full; windows above the exact threshold stream
 * through a {@link LatencyHistogram} instead.
 *
 * @module
 */

import type { Component, ComponentScope } from "../capture/types.js";
import type { EventReader, TimeRange } from "../storage/types.js";
import { DEFAULT_EXACT_THRESHOLD, nearestRank, selectStrategy } from "./percentiles.js";
import type { AggregateSnapshot, PopulatedSnapshot, SnapshotBreakdown } from "./types.js";

export interface AggregationEngineOptions {
  exactThreshold?: number;
}

type Percentiles = Pick<PopulatedSnapshot, "p50_us" | "p95_us" | "p99_us" | "strategy">;

export class AggregationEngine {
  private readonly reader: EventReader;
  private readonly exactThreshold: number;

  constructor(reader: EventReader, options: AggregationEngineOptions = {}) {
    this.reader = reader;
    this.exactThreshold = options.exactThreshold ?? DEFAULT_EXACT_THRESHOLD;
  }

  /** Pure over committed state: the same window and scope give the same snapshot. */
  snapshot(range: TimeRange, scope: ComponentScope = "all"): AggregateSnapshot {
    return this.reader.consistent(() => this.compute(range, scope));
  }

  /**
   * The all-component snapshot plus one snapshot per component with events in
   * the window (in component order), all from the same rows.
   */
  snapshotWithBreakdown(range: TimeRange): SnapshotBreakdown {
    return this.reader.consistent(() => ({
      summary: this.compute(range, "all"),
      components: this.reader.componentsInRange(range).map((component) => this.compute(range, component)),
    }));
  }

  private compute(range: TimeRange, scope: ComponentScope): AggregateSnapshot {
    const component = scope === "all" ? undefined : scope;
    const base = { component: scope, window_start: range.start, window_end: range.end };
    const totals = this.reader.rangeTotals(range, component);

    if (totals.count === 0 || totals.min_us === null || totals.max_us === null) {
      return { ...base, count: 0 };
    }

    const spanSeconds = (range.end - range.start) / 1_000_000;
    return {
      ...base,
      count: totals.count,
      mean_us: totals.sum_us / totals.count,
      ...this.percentiles(range, component, totals.count),
      min_us: totals.min_us,
      max_us: totals.max_us,
      error_rate: totals.failures / totals.count,
      events_per_second: spanSeconds > 0 ? totals.count / spanSeconds : 0,
    };
  }

  private percentiles(range: TimeRange, component: Component | undefined, count: number): Percentiles {
    const strategy = selectStrategy(count, this.exactThreshold);
    if (strategy.kind === "exact") {
      const sorted = this.reader.sortedDurations(range, component);
      return {
        p50_us: nearestRank(sorted, 0.5),
        p95_us: nearestRank(sorted, 0.95),
        p99_us: nearestRank(sorted, 0.99),
        strategy: "exact",
      };
    }

    const { histogram } = strategy;
    for (const duration of this.reader.iterateDurations(range, component)) {
      histogram.record(duration);
    }
    console.info(`[aggregation] Window of ${count} events aggregated by histogram`);
    return {
      p50_us: histogram.percentile(0.5),
      p95_us: histogram.percentile(0.95),
      p99_us: histogram.percentile(0.99),
      strategy: "histogram",
    };
  }
}
