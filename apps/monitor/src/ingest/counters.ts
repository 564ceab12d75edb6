import { fault, type MonitorErrorCode, type MonitorFault } from "../errors.js";

/** Read-only view of every pipeline counter, as exposed by the query interface. */
export interface CounterSnapshot {
  readonly submitted: number;
  readonly accepted: number;
  readonly dropped: number;
  readonly capture_errors: number;
  readonly clamped_durations: number;
  readonly refused_samples: number;
  readonly committed_events: number;
  readonly committed_batches: number;
  readonly commit_failures: number;
  readonly requeued_batches: number;
  readonly lost_batches: number;
  readonly lost_events: number;
  readonly retention_runs: number;
  readonly retention_deleted: number;
  readonly retention_failures: number;
}

type CounterName = Exclude<keyof CounterSnapshot, "accepted">;

/**
 * Owned counter set shared by the sampler, buffer, writer and retention task.
 * One instance is created per monitor and injected at construction; nothing
 * here is module-global. Counters only ever increase.
 */
export class PipelineCounters {
  private readonly values: Record<CounterName, number> = {
    submitted: 0,
    dropped: 0,
    capture_errors: 0,
    clamped_durations: 0,
    refused_samples: 0,
    committed_events: 0,
    committed_batches: 0,
    commit_failures: 0,
    requeued_batches: 0,
    lost_batches: 0,
    lost_events: 0,
    retention_runs: 0,
    retention_deleted: 0,
    retention_failures: 0,
  };

  private readonly faults = new Map<MonitorErrorCode, MonitorFault>();
  private lastCommitMs: number | null = null;
  private failingCommits = 0;

  increment(name: CounterName, by = 1): void {
    this.values[name] += by;
  }

  get(name: CounterName): number {
    return this.values[name];
  }

  /** Events that entered the buffer and were not evicted by overflow. */
  get accepted(): number {
    return this.values.submitted - this.values.dropped;
  }

  recordCommit(events: number, atMs: number): void {
    this.values.committed_events += events;
    this.values.committed_batches += 1;
    this.lastCommitMs = atMs;
    this.failingCommits = 0;
  }

  recordCommitFailure(cause: unknown): void {
    this.values.commit_failures += 1;
    this.failingCommits += 1;
    this.recordFault("COMMIT_FAILURE", cause);
  }

  recordFault(code: MonitorErrorCode, cause: unknown): void {
    this.faults.set(code, fault(code, cause));
  }

  /** Wall-clock milliseconds of the last successful commit, or null before the first. */
  get lastCommitAtMs(): number | null {
    return this.lastCommitMs;
  }

  /** Failed commit attempts since the last successful commit. */
  get consecutiveCommitFailures(): number {
    return this.failingCommits;
  }

  lastFaults(): MonitorFault[] {
    return [...this.faults.values()];
  }

  snapshot(): CounterSnapshot {
    return { ...this.values, accepted: this.accepted };
  }
}
