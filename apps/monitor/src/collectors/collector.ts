/**
 * Periodic process collectors: the monitor's own producers.
 *
 * Each tick takes one process table snapshot and records one event per matcher.
 * The event's duration is the time the snapshot took; its metadata carries how
 * many processes matched the matcher. A failed snapshot records a failed event
 * for every matcher and the next tick tries again.
 *
 * @module
 */

import type { Sampler } from "../capture/sampler.js";
import type { Component } from "../capture/types.js";
import { describeError } from "../errors.js";
import { psScanner, type ProcessScanner } from "./process_table.js";
import { MODEL_MATCHERS, WORKSPACE_MATCHERS, type ProcessMatcher } from "./matchers.js";

export interface ProcessCollectorOptions {
  name: string;
  matchers: readonly ProcessMatcher[];
  intervalMs: number;
  scan?: ProcessScanner;
}

export interface ScanReading {
  readonly component: Component;
  /** Matching processes, or null when the snapshot failed. */
  readonly matched: number | null;
}

export class ProcessCollector {
  readonly name: string;
  private readonly sampler: Sampler;
  private readonly matchers: readonly ProcessMatcher[];
  private readonly intervalMs: number;
  private readonly scan: ProcessScanner;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<ScanReading[]> | null = null;

  constructor(sampler: Sampler, options: ProcessCollectorOptions) {
    if (!Number.isInteger(options.intervalMs) || options.intervalMs <= 0) {
      throw new RangeError(`collector interval must be a positive integer of ms, got ${options.intervalMs}`);
    }
    if (options.matchers.length === 0) {
      throw new RangeError(`collector ${options.name} needs at least one matcher`);
    }
    this.name = options.name;
    this.sampler = sampler;
    this.matchers = options.matchers;
    this.intervalMs = options.intervalMs;
    this.scan = options.scan ?? psScanner;
  }

  /** Run one collection. Never rejects; overlapping calls share the running tick. */
  tick(): Promise<ScanReading[]> {
    this.inFlight ??= this.collect().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  start(): void {
    if (this.timer !== null) {
      return;
    }
    this.timer = setInterval(() => {
      if (this.inFlight === null) {
        void this.tick();
      }
    }, this.intervalMs);
    this.timer.unref();
    console.info(`[collector] ${this.name} scanning every ${this.intervalMs}ms`);
  }

  /** Stop the timer and wait for a tick in progress to record its events. */
  async stop(): Promise<void> {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight !== null) {
      await this.inFlight;
    }
  }

  private async collect(): Promise<ScanReading[]> {
    const handles = this.matchers.map((matcher) => ({ matcher, handle: this.sampler.begin(matcher.component, matcher.sourceLabel) }));
    try {
      const processes = await this.scan();
      return handles.map(({ matcher, handle }) => {
        const matched = processes.filter((proc) => matcher.matches(proc)).length;
        handle.end(true, { matched: String(matched) });
        return { component: matcher.component, matched };
      });
    } catch (err) {
      const reason = describeError(err);
      console.warn(`[collector] ${this.name} process scan failed: ${reason}`);
      return handles.map(({ matcher, handle }) => {
        handle.end(false, { error: reason });
        return { component: matcher.component, matched: null };
      });
    }
  }
}

/**
 * The standard pair: workspace processes every `intervalMs`, model processes
 * every `2 * intervalMs`.
 */
export function createProcessCollectors(
  sampler: Sampler,
  intervalMs: number,
  scan?: ProcessScanner,
): ProcessCollector[] {
  return [
    new ProcessCollector(sampler, { name: "workspace", matchers: WORKSPACE_MATCHERS, intervalMs, scan }),
    new ProcessCollector(sampler, { name: "models", matchers: MODEL_MATCHERS, intervalMs: intervalMs * 2, scan }),
  ];
}
