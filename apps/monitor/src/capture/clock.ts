// Clock seams for the sampler: a monotonic clock for durations, a wall clock for stamps.

/**
 * Monotonic clock used for every duration computation.
 * Default implementation uses `performance.now()` (milliseconds, sub-ms precision).
 *
 * Node exposes the full OS timer resolution, so deltas resolve to the microsecond.
 */
export interface MonotonicClock {
  now(): number;
}

/**
 * Calendar clock used only to stamp `wall_timestamp`. Never subtracted to get a
 * duration: it can step backward under NTP correction.
 */
export interface WallClock {
  /** Microseconds since the Unix epoch. */
  nowMicros(): number;
}

// Fail-fast: ensure performance.now is available at module load.
if (typeof performance === "undefined" || typeof performance.now !== "function") {
  throw new Error(
    "performance.now() is required for monotonic timing but is unavailable in this environment.",
  );
}

export const monotonicClock: MonotonicClock = { now: () => performance.now() };

/** Epoch time with the monotonic clock's sub-millisecond part, in whole microseconds. */
export const systemWallClock: WallClock = {
  nowMicros: () => Math.round((performance.timeOrigin + performance.now()) * 1000),
};

/** Converts a millisecond delta from the monotonic clock to whole microseconds. */
export function toMicros(deltaMs: number): number {
  return Math.round(deltaMs * 1000);
}

export function microsToIso(micros: number): string {
  return new Date(Math.floor(micros / 1000)).toISOString();
}

/**
 * Manually advanced clocks for tests and simulations.
 * Both sides move together unless a test skews the wall clock on purpose.
 */
export class ManualClock implements MonotonicClock, WallClock {
  private monotonicMs: number;
  private wallUs: number;

  constructor(startWallUs = 1_700_000_000_000_000) {
    this.monotonicMs = 0;
    this.wallUs = startWallUs;
  }

  now(): number {
    return this.monotonicMs;
  }

  nowMicros(): number {
    return this.wallUs;
  }

  /** Advance both clocks by `us` microseconds. */
  advanceMicros(us: number): void {
    this.monotonicMs += us / 1000;
    this.wallUs += us;
  }

  /** Move only the wall clock, e.g. to simulate an NTP step. */
  setWallMicros(us: number): void {
    this.wallUs = us;
  }

  /** Force an arbitrary monotonic reading (tests of invalid clocks). */
  setMonotonicMs(ms: number): void {
    this.monotonicMs = ms;
  }
}
