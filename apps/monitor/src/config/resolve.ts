import { createRetentionPolicy } from "../storage/retention.js";
import type { RetentionPolicy } from "../storage/types.js";
import { SETTINGS_SCHEMA, validateValue } from "./schema.js";

/** Typed monitor configuration resolved from the flat settings map. */
export interface MonitorConfig {
  databasePath: string;
  bufferCapacity: number;
  writer: {
    batchSize: number;
    flushIntervalMs: number;
    maxRetries: number;
    baseBackoffMs: number;
    maxBackoffMs: number;
  };
  retention: RetentionPolicy;
  retentionIntervalMs: number;
  exactThreshold: number;
  /** 0 disables the built-in process collectors. */
  collectorIntervalMs: number;
  port: number;
}

function readInteger(values: Record<string, unknown>, key: string): number {
  const value = values[key];
  if (typeof value === "number" && validateValue(key, value).valid) {
    return value;
  }
  const fallback = SETTINGS_SCHEMA[key]?.default;
  if (typeof fallback !== "number") {
    throw new Error(`No integer setting named ${key}`);
  }
  return fallback;
}

function readString(values: Record<string, unknown>, key: string): string {
  const value = values[key];
  if (typeof value === "string" && validateValue(key, value).valid) {
    return value;
  }
  const fallback = SETTINGS_SCHEMA[key]?.default;
  if (typeof fallback !== "string") {
    throw new Error(`No string setting named ${key}`);
  }
  return fallback;
}

/** `retention.max_count = 0` means no count cap. */
export function resolveRetentionPolicy(values: Record<string, unknown>): RetentionPolicy {
  const maxCount = readInteger(values, "retention.max_count");
  return createRetentionPolicy({
    max_age_days: readInteger(values, "retention.max_age_days"),
    max_count: maxCount === 0 ? undefined : maxCount,
  });
}

export function resolveMonitorConfig(values: Record<string, unknown>): MonitorConfig {
  return {
    databasePath: readString(values, "storage.database_path"),
    bufferCapacity: readInteger(values, "buffer.capacity"),
    writer: {
      batchSize: readInteger(values, "writer.batch_size"),
      flushIntervalMs: readInteger(values, "writer.flush_interval_ms"),
      maxRetries: readInteger(values, "writer.max_retries"),
      baseBackoffMs: readInteger(values, "writer.base_backoff_ms"),
      maxBackoffMs: readInteger(values, "writer.max_backoff_ms"),
    },
    retention: resolveRetentionPolicy(values),
    retentionIntervalMs: readInteger(values, "retention.interval_ms"),
    exactThreshold: readInteger(values, "aggregation.exact_threshold"),
    collectorIntervalMs: readInteger(values, "collectors.interval_ms"),
    port: readInteger(values, "server.port"),
  };
}
