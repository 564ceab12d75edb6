// Time-sortable ULID bodies: 10 chars of millisecond time + 16 chars of randomness,
// Crockford base32. Ids minted in the same millisecond stay ordered by bumping
// the random component instead of drawing a new one.

import { randomFillSync } from 'node:crypto';

export const CROCKFORD_BASE32 = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const ENCODING_LEN = 32;
const TIME_LEN = 10;
const RANDOM_LEN = 16;
const MAX_TIME = 281474976710655; // 2^48 - 1

export type RandomSource = (bytes: Uint8Array) => void;

export interface UlidFactoryOptions {
  now?: () => number;
  random?: RandomSource;
}

export function encodeTime(timestamp: number): string {
  if (!Number.isInteger(timestamp) || timestamp < 0 || timestamp > MAX_TIME) {
    throw new RangeError(`Timestamp must be an integer between 0 and ${MAX_TIME}`);
  }
  let out = '';
  let t = timestamp;
  for (let i = 0; i < TIME_LEN; i++) {
    out = CROCKFORD_BASE32.charAt(t % ENCODING_LEN) + out;
    t = Math.floor(t / ENCODING_LEN);
  }
  return out;
}

/**
 * Stateful ULID source. Each factory keeps its own "last timestamp" so tests
 * can run one with a pinned clock without disturbing the shared default.
 */
export class UlidFactory {
  private readonly now: () => number;
  private readonly random: RandomSource;
  private lastTime = -1;
  private lastDigits: number[] = [];

  constructor(options: UlidFactoryOptions = {}) {
    this.now = options.now ?? Date.now;
    this.random = options.random ?? randomFillSync;
  }

  next(): string {
    // A clock that steps backward keeps the previous timestamp.
    const time = Math.max(this.now(), this.lastTime);

    if (time === this.lastTime) {
      this.lastDigits = increment(this.lastDigits);
    } else {
      this.lastTime = time;
      this.lastDigits = this.freshDigits();
    }

    let body = encodeTime(time);
    for (const digit of this.lastDigits) {
      body += CROCKFORD_BASE32.charAt(digit);
    }
    return body;
  }

  private freshDigits(): number[] {
    const bytes = new Uint8Array(RANDOM_LEN);
    this.random(bytes);
    return Array.from(bytes, (byte) => byte % ENCODING_LEN);
  }
}

function increment(digits: readonly number[]): number[] {
  const out = digits.slice();
  for (let i = out.length - 1; i >= 0; i--) {
    const bumped = (out[i] ?? 0) + 1;
    if (bumped < ENCODING_LEN) {
      out[i] = bumped;
      return out;
    }
    out[i] = 0;
  }
  throw new Error('ULID random component overflow; retry in the next millisecond');
}

const defaultFactory = new UlidFactory();

export function generateUlid(): string {
  return defaultFactory.next();
}
