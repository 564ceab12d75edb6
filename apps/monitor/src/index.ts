/**
 * Monitor assembly: wires the sampler, buffer, writer, store, aggregation,
 * query, sessions and HTTP surface around one injected counter set.
 *
 * @module
 */

import type { Hono } from "hono";
import { AggregationEngine } from "./aggregation/engine.js";
import type { MonotonicClock, WallClock } from "./capture/clock.js";
import { createProcessCollectors, type ProcessCollector } from "./collectors/collector.js";
import type { ProcessScanner } from "./collectors/process_table.js";
import { Sampler } from "./capture/sampler.js";
import type { MonitorConfig } from "./config/resolve.js";
import { createApp } from "./http/app.js";
import type { SystemResourceProvider } from "./http/resources.js";
import { IngestionBuffer } from "./ingest/buffer.js";
import { PipelineCounters } from "./ingest/counters.js";
import { BatchWriter } from "./ingest/writer.js";
import { QueryInterface } from "./query/query.js";
import { SessionManager, type SessionHandle } from "./session/sessions.js";
import { SqliteEventStore } from "./storage/event_store.js";
import { RetentionTask } from "./storage/retention.js";

export type MonitorOptions = {
  clock?: MonotonicClock;
  wallClock?: WallClock;
  resources?: SystemResourceProvider;
  /** Process table source for the built-in collectors (default: `ps`). */
  scan?: ProcessScanner;
  /** Start the writer and retention timers right away (default true). */
  autoStart?: boolean;
};

export interface Monitor {
  readonly store: SqliteEventStore;
  readonly counters: PipelineCounters;
  readonly buffer: IngestionBuffer;
  readonly writer: BatchWriter;
  readonly retention: RetentionTask;
  readonly query: QueryInterface;
  readonly sessions: SessionManager;
  readonly app: Hono;
  /** An ungated producer, for callers that do not use sessions. */
  createSampler(): Sampler;
  /**
   * Start an all-component session and drive the built-in process collectors
   * through its sampler. With `collectorIntervalMs = 0` only the session starts.
   */
  startCollection(): SessionHandle;
  /** Stop collectors, sessions and timers, drain everything buffered, close the store. */
  shutdown(): Promise<void>;
}

/**
 * Build a monitor over the store at `config.databasePath`.
 * @throws StorageInitError when the store cannot be opened.
 */
export function createMonitor(config: MonitorConfig, options: MonitorOptions = {}): Monitor {
  const { clock, wallClock } = options;
  const store = SqliteEventStore.open(config.databasePath);
  const counters = new PipelineCounters();
  const buffer = new IngestionBuffer(counters, config.bufferCapacity);
  const writer = new BatchWriter(buffer, store.acquireWriter(), counters, { ...config.writer, wallClock });
  const retention = new RetentionTask(writer, config.retention, counters, {
    intervalMs: config.retentionIntervalMs,
    wallClock,
  });
  const engine = new AggregationEngine(store.reader, { exactThreshold: config.exactThreshold });
  const query = new QueryInterface(store.reader, engine, counters, { wallClock });
  const sessions = new SessionManager({
    sink: buffer,
    counters,
    flush: () => writer.flush(),
    clock,
    wallClock,
  });
  const app = createApp({ query, sessions, counters, buffer, resources: options.resources });

  if (options.autoStart ?? true) {
    writer.start();
    retention.start();
  }

  const collectors: ProcessCollector[] = [];
  const startCollection = (): SessionHandle => {
    const session = sessions.startSession("all");
    if (config.collectorIntervalMs > 0) {
      for (const collector of createProcessCollectors(session.createSampler(), config.collectorIntervalMs, options.scan)) {
        collector.start();
        collectors.push(collector);
      }
    }
    return session;
  };

  let closing: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    closing ??= (async () => {
      retention.stop();
      await Promise.all(collectors.map((collector) => collector.stop()));
      await sessions.stopAll();
      await writer.close();
      store.close();
      console.info("[monitor] Shut down; all buffered events drained");
    })();
    return closing;
  };

  return {
    store,
    counters,
    buffer,
    writer,
    retention,
    query,
    sessions,
    app,
    createSampler: () => new Sampler(buffer, counters, { clock, wallClock }),
    startCollection,
    shutdown,
  };
}

export { AggregationEngine } from "./aggregation/engine.js";
export { LatencyHistogram } from "./aggregation/histogram.js";
export { nearestRank, selectStrategy } from "./aggregation/percentiles.js";
export { isPopulated } from "./aggregation/types.js";
export type { AggregateSnapshot, EmptySnapshot, PopulatedSnapshot } from "./aggregation/types.js";
export { ManualClock, monotonicClock, systemWallClock } from "./capture/clock.js";
export type { MonotonicClock, WallClock } from "./capture/clock.js";
export { Sampler } from "./capture/sampler.js";
export type { SampleHandle } from "./capture/sampler.js";
export { COMPONENTS, isComponent } from "./capture/types.js";
export type { Component, ComponentScope, LatencyEvent, PendingEvent } from "./capture/types.js";
export { ProcessCollector, createProcessCollectors } from "./collectors/collector.js";
export type { ScanReading } from "./collectors/collector.js";
export type { ProcessInfo, ProcessScanner } from "./collectors/process_table.js";
export { resolveMonitorConfig } from "./config/resolve.js";
export type { MonitorConfig } from "./config/resolve.js";
export * from "./errors.js";
export type { CounterSnapshot } from "./ingest/counters.js";
export type { ExportRecord, HealthReport } from "./query/query.js";
export { parseWindow } from "./query/window.js";
export type { SessionHandle, SessionInfo } from "./session/sessions.js";
export { createRetentionPolicy } from "./storage/retention.js";
export type { RetentionPolicy, TimeRange } from "./storage/types.js";
