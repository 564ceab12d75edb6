// Query argument validation: windows, component filters, limits.

import { isComponent, type ComponentScope } from "../capture/types.js";
import { QueryError } from "../errors.js";
import type { TimeRange } from "../storage/types.js";

const UNIT_US = {
  s: 1_000_000,
  m: 60 * 1_000_000,
  h: 60 * 60 * 1_000_000,
  d: 24 * 60 * 60 * 1_000_000,
} as const;

/** Named windows offered by the HTTP surface. Any `<n><s|m|h|d>` is accepted. */
export const WINDOW_PRESETS = ["15m", "1h", "24h", "7d"] as const;

/** A relative duration such as `"1h"`, or an explicit half-open µs range. */
export type WindowSpec = string | TimeRange;

export const DEFAULT_EVENT_LIMIT = 100;
export const MAX_EVENT_LIMIT = 10_000;

const WINDOW_PATTERN = /^(\d+)([smhd])$/;

function isUnit(value: string): value is keyof typeof UNIT_US {
  return value in UNIT_US;
}

/**
 * Turn a relative window into the range ending at `nowUs`, inclusive of an
 * event stamped exactly at `nowUs`.
 */
export function parseWindow(raw: string, nowUs: number): TimeRange {
  const match = WINDOW_PATTERN.exec(raw.trim());
  const amount = match?.[1];
  const unit = match?.[2];
  if (amount === undefined || unit === undefined || !isUnit(unit)) {
    throw new QueryError(`Malformed window: "${raw}" (expected e.g. ${WINDOW_PRESETS.join(", ")})`);
  }
  const lengthUs = Number(amount) * UNIT_US[unit];
  if (lengthUs <= 0 || !Number.isSafeInteger(lengthUs)) {
    throw new QueryError(`Window out of range: "${raw}"`);
  }
  const end = nowUs + 1;
  return { start: end - lengthUs, end };
}

export function resolveWindow(window: WindowSpec, nowUs: number): TimeRange {
  if (typeof window === "string") {
    return parseWindow(window, nowUs);
  }
  const { start, end } = window;
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw new QueryError("Window bounds must be integer microseconds");
  }
  if (start > end) {
    throw new QueryError(`Window start ${start} is after its end ${end}`);
  }
  return { start, end };
}

/** `undefined` and `"all"` both mean every component. */
export function resolveScope(component: string | undefined): ComponentScope {
  if (component === undefined || component === "all") {
    return "all";
  }
  if (!isComponent(component)) {
    throw new QueryError(`Unknown component: ${component}`);
  }
  return component;
}

export function validateLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_EVENT_LIMIT) {
    throw new QueryError(`Limit must be an integer between 1 and ${MAX_EVENT_LIMIT}, got ${limit}`);
  }
  return limit;
}
