/**
 * Monitoring sessions: the trigger surface for starting and stopping capture.
 *
 * A session admits samples for its component filter while active. Stopping it
 * (on demand or at its deadline) closes admission first, then flushes the
 * ingestion buffer through the writer, then marks the session stopped.
 *
 * @module
 */

import { generateSessionId, validateId } from "@latency-monitor/ids";
import type { MonotonicClock, WallClock } from "../capture/clock.js";
import { Sampler, type EventSink } from "../capture/sampler.js";
import { isComponent, type Component } from "../capture/types.js";
import { describeError } from "../errors.js";
import type { PipelineCounters } from "../ingest/counters.js";
import { transition, type SessionEvent, type SessionState, type SessionTransition } from "./state_machine.js";

export type ComponentFilter = "all" | readonly Component[];

export interface SessionInfo {
  readonly id: string;
  readonly state: SessionState;
  readonly components: "all" | Component[];
  readonly started_at: string;
  readonly deadline_at: string | null;
  readonly stopped_at: string | null;
}

export interface SessionManagerDeps {
  sink: EventSink;
  counters: PipelineCounters;
  /** Drains the ingestion buffer into the store. */
  flush: () => Promise<unknown>;
  clock?: MonotonicClock;
  wallClock?: WallClock;
}

const MAX_HISTORY = 20;

export class SessionHandle {
  readonly id: string;
  readonly startedAt: Date;
  readonly deadlineAt: Date | null;
  private readonly components: ReadonlySet<Component> | null;
  private readonly deps: SessionManagerDeps;
  private current: SessionState = "active";
  private stoppedAt: Date | null = null;
  private readonly transitions: SessionTransition[] = [];
  private drain: Promise<void> | null = null;

  constructor(id: string, filter: ComponentFilter, deps: SessionManagerDeps, durationMs?: number) {
    this.id = id;
    this.deps = deps;
    this.components = filter === "all" ? null : new Set(filter);
    this.startedAt = new Date();
    this.deadlineAt = durationMs === undefined ? null : new Date(this.startedAt.getTime() + durationMs);
  }

  get state(): SessionState {
    return this.current;
  }

  get history(): readonly SessionTransition[] {
    return this.transitions;
  }

  /** True when a sample for `component` may start now. */
  admits(component: Component): boolean {
    return this.current === "active" && (this.components === null || this.components.has(component));
  }

  /** A producer whose samples are admitted only while this session is active. */
  createSampler(): Sampler {
    return new Sampler(this.deps.sink, this.deps.counters, {
      clock: this.deps.clock,
      wallClock: this.deps.wallClock,
      admit: (component) => this.admits(component),
    });
  }

  /**
   * Stop admitting and drain. Concurrent callers share one drain; calling it
   * on a stopped session resolves immediately.
   */
  stop(event: Extract<SessionEvent, "stop" | "deadline"> = "stop"): Promise<void> {
    if (this.current === "stopped") {
      return Promise.resolve();
    }
    this.apply(event);
    if (this.drain === null) {
      this.drain = this.runDrain();
    }
    return this.drain;
  }

  info(): SessionInfo {
    return {
      id: this.id,
      state: this.current,
      components: this.components === null ? "all" : [...this.components],
      started_at: this.startedAt.toISOString(),
      deadline_at: this.deadlineAt?.toISOString() ?? null,
      stopped_at: this.stoppedAt?.toISOString() ?? null,
    };
  }

  private async runDrain(): Promise<void> {
    try {
      await this.deps.flush();
    } catch (err) {
      console.error(`[session] Drain of ${this.id} failed: ${describeError(err)}`);
    }
    this.apply("drained");
    this.stoppedAt = new Date();
    console.info(`[session] Session ${this.id} stopped`);
  }

  private apply(event: SessionEvent): void {
    const from = this.current;
    const to = transition(from, event, this.id);
    this.current = to;
    this.transitions.push({ fromState: from, event, toState: to, timestamp: new Date().toISOString() });
    if (this.transitions.length > MAX_HISTORY) {
      this.transitions.splice(0, this.transitions.length - MAX_HISTORY);
    }
  }
}

export class SessionManager {
  private readonly deps: SessionManagerDeps;
  private readonly sessions = new Map<string, SessionHandle>();
  private readonly deadlines = new Map<string, ReturnType<typeof setTimeout>>();

  constructor(deps: SessionManagerDeps) {
    this.deps = deps;
  }

  /**
   * Start a session for `"all"` components or a non-empty list of them.
   * With `durationMs`, the session stops and drains itself at the deadline.
   */
  startSession(filter: ComponentFilter, durationMs?: number): SessionHandle {
    validateFilter(filter);
    if (durationMs !== undefined && (!Number.isFinite(durationMs) || durationMs <= 0)) {
      throw new RangeError(`session duration must be a positive number of ms, got ${durationMs}`);
    }

    const handle = new SessionHandle(generateSessionId(), filter, this.deps, durationMs);
    this.sessions.set(handle.id, handle);

    if (durationMs !== undefined) {
      const timer = setTimeout(() => {
        this.deadlines.delete(handle.id);
        handle.stop("deadline").catch((err: unknown) => {
          console.error(`[session] Deadline stop of ${handle.id} failed: ${describeError(err)}`);
        });
      }, durationMs);
      timer.unref();
      this.deadlines.set(handle.id, timer);
    }

    const scope = filter === "all" ? "all components" : filter.join(", ");
    console.info(`[session] Session ${handle.id} started for ${scope}`);
    return handle;
  }

  /** Stop a session by handle or id. Resolves once its drain has completed. */
  stopSession(target: SessionHandle | string): Promise<void> {
    const id = typeof target === "string" ? target : target.id;
    const check = validateId(id, "session");
    if (!check.valid) {
      throw new Error(`Malformed session id "${id}": ${check.reason}`);
    }
    const handle = this.sessions.get(id);
    if (handle === undefined) {
      throw new Error(`Unknown session: ${id}`);
    }
    this.clearDeadline(id);
    return handle.stop("stop");
  }

  get(id: string): SessionHandle | undefined {
    return this.sessions.get(id);
  }

  list(): SessionInfo[] {
    return [...this.sessions.values()].map((handle) => handle.info());
  }

  /** Stop every session that is not stopped yet. */
  async stopAll(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((id) => this.stopSession(id)));
  }

  private clearDeadline(id: string): void {
    const timer = this.deadlines.get(id);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.deadlines.delete(id);
    }
  }
}

function validateFilter(filter: ComponentFilter): void {
  if (filter === "all") {
    return;
  }
  if (filter.length === 0) {
    throw new RangeError("session filter must be \"all\" or a non-empty component list");
  }
  for (const component of filter) {
    if (!isComponent(component)) {
      throw new RangeError(`Unknown component in session filter: ${String(component)}`);
    }
  }
}
