import { MAX_DURATION_US } from "../capture/types.js";

/**
 * Log-linear latency histogram over `[0, MAX_DURATION_US]`.
 *
 * Values below `2^SUB_BUCKET_BITS` each get their own bucket. Above that,
 * every power-of-two range is split into `2^SUB_BUCKET_BITS` equal sub-buckets,
 * so a bucket's width never exceeds 1/128 of its lower bound.
 *
 * count, sum, min and max are tracked exactly. A percentile is reported as the
 * upper bound of the bucket holding the nearest-rank sample, clamped to
 * `[min, max]`.
 */

const SUB_BUCKET_BITS = 7;
const SUB_BUCKETS = 2 ** SUB_BUCKET_BITS;
const MAX_EXPONENT = Math.floor(Math.log2(MAX_DURATION_US));
const BUCKET_COUNT = SUB_BUCKETS + (MAX_EXPONENT - SUB_BUCKET_BITS + 1) * SUB_BUCKETS;

function exponentOf(value: number): number {
  let e = Math.floor(Math.log2(value));
  // log2 is inexact near powers of two.
  if (2 ** e > value) e -= 1;
  if (2 ** (e + 1) <= value) e += 1;
  return e;
}

/** Index of the bucket holding `value` (a non-negative integer). */
export function bucketIndex(value: number): number {
  if (value < SUB_BUCKETS) {
    return value;
  }
  const e = exponentOf(value);
  const width = 2 ** (e - SUB_BUCKET_BITS);
  const sub = Math.floor(value / width) - SUB_BUCKETS;
  return SUB_BUCKETS + (e - SUB_BUCKET_BITS) * SUB_BUCKETS + sub;
}

/** Largest value that falls in bucket `index`. */
export function bucketUpperBound(index: number): number {
  if (index < SUB_BUCKETS) {
    return index;
  }
  const tier = Math.floor((index - SUB_BUCKETS) / SUB_BUCKETS);
  const sub = (index - SUB_BUCKETS) % SUB_BUCKETS;
  const width = 2 ** tier;
  return Math.min((SUB_BUCKETS + sub + 1) * width - 1, MAX_DURATION_US);
}

export class LatencyHistogram {
  private readonly counts = new Float64Array(BUCKET_COUNT);
  private total = 0;
  private sumUs = 0;
  private minUs = Number.POSITIVE_INFINITY;
  private maxUs = Number.NEGATIVE_INFINITY;

  get count(): number {
    return this.total;
  }

  get sum(): number {
    return this.sumUs;
  }

  get min(): number | null {
    return this.total === 0 ? null : this.minUs;
  }

  get max(): number | null {
    return this.total === 0 ? null : this.maxUs;
  }

  record(durationUs: number): void {
    if (!Number.isInteger(durationUs) || durationUs < 0) {
      throw new RangeError(`duration must be a non-negative integer, got ${durationUs}`);
    }
    const value = Math.min(durationUs, MAX_DURATION_US);
    this.counts[bucketIndex(value)] += 1;
    this.total += 1;
    this.sumUs += value;
    if (value < this.minUs) this.minUs = value;
    if (value > this.maxUs) this.maxUs = value;
  }

  /** Approximate nearest-rank percentile, `p` in `[0, 1]`. */
  percentile(p: number): number {
    if (this.total === 0) {
      throw new RangeError("percentile of an empty histogram");
    }
    if (!(p >= 0 && p <= 1)) {
      throw new RangeError(`percentile must be within [0, 1], got ${p}`);
    }
    const rank = Math.min(Math.max(Math.ceil(p * this.total), 1), this.total);
    let seen = 0;
    for (let i = 0; i < BUCKET_COUNT; i++) {
      seen += this.counts[i] ?? 0;
      if (seen >= rank) {
        return Math.min(Math.max(bucketUpperBound(i), this.minUs), this.maxUs);
      }
    }
    return this.maxUs;
  }
}
