/**
 * Read-only query interface over committed events.
 *
 * Runs entirely on the store's read connection and never waits for the batch
 * writer. Buffered events that are not committed yet are invisible here.
 * Invalid arguments throw {@link QueryError} before anything is read.
 *
 * @module
 */

import { microsToIso, systemWallClock, type WallClock } from "../capture/clock.js";
import type { LatencyEvent } from "../capture/types.js";
import type { AggregationEngine } from "../aggregation/engine.js";
import type { AggregateSnapshot, SnapshotBreakdown } from "../aggregation/types.js";
import type { CounterSnapshot, PipelineCounters } from "../ingest/counters.js";
import type { EventReader } from "../storage/types.js";
import {
  DEFAULT_EVENT_LIMIT,
  MAX_EVENT_LIMIT,
  resolveScope,
  resolveWindow,
  validateLimit,
  type WindowSpec,
} from "./window.js";

export interface HealthReport {
  /** Storage reachable and no commit attempt has failed since the last success. */
  readonly ok: boolean;
  readonly last_commit_age_ms: number | null;
  readonly storage_reachable: boolean;
  readonly consecutive_commit_failures: number;
}

/** An exported event with its wall stamp rendered for people. */
export interface ExportRecord extends LatencyEvent {
  readonly wall_time_iso: string;
}

/** At most `limit` records of a window, oldest first, and how many the window holds. */
export interface ExportPage {
  readonly records: ExportRecord[];
  readonly total_in_window: number;
}

export interface QueryInterfaceOptions {
  wallClock?: WallClock;
}

export class QueryInterface {
  private readonly reader: EventReader;
  private readonly engine: AggregationEngine;
  private readonly pipeline: PipelineCounters;
  private readonly wallClock: WallClock;

  constructor(
    reader: EventReader,
    engine: AggregationEngine,
    counters: PipelineCounters,
    options: QueryInterfaceOptions = {},
  ) {
    this.reader = reader;
    this.engine = engine;
    this.pipeline = counters;
    this.wallClock = options.wallClock ?? systemWallClock;
  }

  /** Most recent committed events, newest first (ties broken by id, descending). */
  rawEvents(limit: number = DEFAULT_EVENT_LIMIT, component?: string): LatencyEvent[] {
    const validLimit = validateLimit(limit);
    const scope = resolveScope(component);
    return this.reader.recent(validLimit, scope === "all" ? undefined : scope);
  }

  totalCount(): number {
    return this.reader.totalCount();
  }

  /** The newest committed event, if any. */
  lastEvent(): LatencyEvent | undefined {
    return this.reader.lastEvent();
  }

  summary(window: WindowSpec, component?: string): AggregateSnapshot {
    const scope = resolveScope(component);
    const range = resolveWindow(window, this.wallClock.nowMicros());
    return this.engine.snapshot(range, scope);
  }

  /** Overall summary plus the per-component breakdown, over one resolved window. */
  summaryWithBreakdown(window: WindowSpec): SnapshotBreakdown {
    const range = resolveWindow(window, this.wallClock.nowMicros());
    return this.engine.snapshotWithBreakdown(range);
  }

  droppedCount(): number {
    return this.pipeline.get("dropped");
  }

  counters(): CounterSnapshot {
    return this.pipeline.snapshot();
  }

  health(nowMs: number = Math.floor(this.wallClock.nowMicros() / 1000)): HealthReport {
    const storageReachable = this.reader.ping();
    const lastCommit = this.pipeline.lastCommitAtMs;
    const failures = this.pipeline.consecutiveCommitFailures;
    return {
      ok: storageReachable && failures === 0,
      last_commit_age_ms: lastCommit === null ? null : Math.max(0, nowMs - lastCommit),
      storage_reachable: storageReachable,
      consecutive_commit_failures: failures,
    };
  }

  /** Committed events of a window in wall order, for export, capped at `limit`. */
  exportEvents(window: WindowSpec, component?: string, limit: number = MAX_EVENT_LIMIT): ExportPage {
    const validLimit = validateLimit(limit);
    const scope = resolveScope(component);
    const range = resolveWindow(window, this.wallClock.nowMicros());
    const filter = scope === "all" ? undefined : scope;
    return this.reader.consistent(() => {
      const records: ExportRecord[] = [];
      for (const event of this.reader.exportRange(range, filter)) {
        if (records.length === validLimit) {
          break;
        }
        records.push({ ...event, wall_time_iso: microsToIso(event.wall_timestamp) });
      }
      return { records, total_in_window: this.reader.countInRange(range, filter) };
    });
  }
}
