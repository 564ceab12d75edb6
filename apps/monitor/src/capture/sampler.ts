/**
 * Sampler: wraps a timed operation and produces a {@link PendingEvent}.
 *
 * `begin` reads the monotonic clock once and allocates a small handle; `end`
 * reads it again, stamps the wall clock and hands the event to the ingestion
 * sink. Neither call suspends or throws into the measured operation.
 *
 * @module
 */

import { describeError } from "../errors.js";
import type { PipelineCounters } from "../ingest/counters.js";
import { monotonicClock, systemWallClock, toMicros, type MonotonicClock, type WallClock } from "./clock.js";
import { MAX_DURATION_US, type Component, type PendingEvent } from "./types.js";

/** Non-blocking handoff target for completed events (the ingestion buffer). */
export interface EventSink {
  push(event: PendingEvent): void;
}

/** Decides whether a new operation may start; used by monitoring sessions. */
export type AdmissionGate = (component: Component) => boolean;

export interface SampleHandle {
  readonly component: Component;
  readonly sourceLabel: string;
  /**
   * Complete the measurement. Returns the captured event, or `undefined` when
   * the sample was refused, already ended, or failed to capture.
   */
  end(success: boolean, metadata?: Record<string, string>): PendingEvent | undefined;
}

export interface SamplerOptions {
  clock?: MonotonicClock;
  wallClock?: WallClock;
  admit?: AdmissionGate;
}

const NO_METADATA: Readonly<Record<string, string>> = Object.freeze({});

class RefusedHandle implements SampleHandle {
  constructor(
    readonly component: Component,
    readonly sourceLabel: string,
  ) {}

  end(): undefined {
    return undefined;
  }
}

class ActiveHandle implements SampleHandle {
  private ended = false;

  constructor(
    private readonly sampler: Sampler,
    readonly component: Component,
    readonly sourceLabel: string,
    private readonly startMs: number,
    private readonly metadata: Readonly<Record<string, string>>,
  ) {}

  end(success: boolean, metadata?: Record<string, string>): PendingEvent | undefined {
    if (this.ended) {
      return undefined;
    }
    this.ended = true;
    const merged = metadata === undefined ? this.metadata : { ...this.metadata, ...metadata };
    return this.sampler.complete(this.component, this.sourceLabel, this.startMs, success, merged);
  }
}

/**
 * One sampler per producer. The only state it keeps is the last wall stamp it
 * issued, so that its own events never go backward in wall time.
 */
export class Sampler {
  private readonly sink: EventSink;
  private readonly counters: PipelineCounters;
  private readonly clock: MonotonicClock;
  private readonly wallClock: WallClock;
  private readonly admit: AdmissionGate | undefined;
  private lastWallUs = 0;

  constructor(sink: EventSink, counters: PipelineCounters, options: SamplerOptions = {}) {
    this.sink = sink;
    this.counters = counters;
    this.clock = options.clock ?? monotonicClock;
    this.wallClock = options.wallClock ?? systemWallClock;
    this.admit = options.admit;
  }

  begin(component: Component, sourceLabel: string, metadata?: Record<string, string>): SampleHandle {
    if (this.admit !== undefined && !this.admit(component)) {
      this.counters.increment("refused_samples");
      return new RefusedHandle(component, sourceLabel);
    }
    return new ActiveHandle(this, component, sourceLabel, this.clock.now(), metadata ?? NO_METADATA);
  }

  /**
   * Time an async operation. The operation's result or rejection passes through
   * unchanged; `success` records which of the two happened.
   */
  async measure<T>(
    component: Component,
    sourceLabel: string,
    operation: () => Promise<T>,
    metadata?: Record<string, string>,
  ): Promise<T> {
    const handle = this.begin(component, sourceLabel, metadata);
    let result: T;
    try {
      result = await operation();
    } catch (err) {
      handle.end(false, { error: describeError(err) });
      throw err;
    }
    handle.end(true);
    return result;
  }

  /** Called by a handle's `end`. */
  complete(
    component: Component,
    sourceLabel: string,
    startMs: number,
    success: boolean,
    metadata: Readonly<Record<string, string>>,
  ): PendingEvent | undefined {
    const endMs = this.clock.now();
    const deltaMs = endMs - startMs;
    const wallUs = this.wallClock.nowMicros();

    if (!Number.isFinite(deltaMs) || deltaMs < 0 || !Number.isFinite(wallUs)) {
      this.counters.increment("capture_errors");
      this.counters.recordFault(
        "CAPTURE_FAILURE",
        `invalid clock reading for ${component}/${sourceLabel} (delta ${deltaMs}ms, wall ${wallUs}us)`,
      );
      return undefined;
    }

    let durationUs = toMicros(deltaMs);
    let meta = metadata;
    if (durationUs > MAX_DURATION_US) {
      durationUs = MAX_DURATION_US;
      meta = { ...metadata, duration_clamped: "true" };
      this.counters.increment("clamped_durations");
    }

    // Wall clocks can step backward; this producer's stamps must not.
    const stamp = Math.max(Math.trunc(wallUs), this.lastWallUs);
    this.lastWallUs = stamp;

    const event: PendingEvent = Object.freeze({
      wall_timestamp: stamp,
      component,
      source_label: sourceLabel,
      duration_us: durationUs,
      success,
      metadata: Object.freeze({ ...meta }),
    });
    this.sink.push(event);
    return event;
  }
}
