// Nearest-rank percentiles and the exact/histogram strategy switch.

import { LatencyHistogram } from "./histogram.js";

/** Default cut-over: windows up to this many events are aggregated exactly. */
export const DEFAULT_EXACT_THRESHOLD = 1_000_000;

/**
 * Nearest-rank percentile of an ascending array: the element at
 * `ceil(p * N) - 1`, clamped to `[0, N - 1]`.
 *
 * @param p fraction in `[0, 1]`
 */
export function nearestRank(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new RangeError("nearestRank of an empty sample");
  }
  if (!(p >= 0 && p <= 1)) {
    throw new RangeError(`percentile must be within [0, 1], got ${p}`);
  }
  const index = Math.min(Math.max(Math.ceil(p * sorted.length) - 1, 0), sorted.length - 1);
  const value = sorted[index];
  if (value === undefined) {
    throw new RangeError(`no element at rank ${index + 1}`);
  }
  return value;
}

export type AggregationStrategy =
  | { readonly kind: "exact" }
  | { readonly kind: "histogram"; readonly histogram: LatencyHistogram };

export function selectStrategy(count: number, exactThreshold: number): AggregationStrategy {
  if (count <= exactThreshold) {
    return { kind: "exact" };
  }
  return { kind: "histogram", histogram: new LatencyHistogram() };
}
