import { homedir } from "node:os";
import { join } from "node:path";
import type { SettingDefinition, SettingsSchema } from "./types.js";

export const DEFAULT_DATABASE_PATH = join(homedir(), ".local", "share", "latency-monitor", "metrics.db");

export const DEFAULT_SETTINGS_PATH = join(homedir(), ".config", "latency-monitor", "settings.json");

function integer(
  key: string,
  defaultValue: number,
  min: number,
  max: number,
  reloadPolicy: SettingDefinition["reloadPolicy"],
  description: string,
): SettingDefinition {
  return { key, type: "integer", default: defaultValue, min, max, reloadPolicy, description };
}

/** Monitor settings schema. */
export const SETTINGS_SCHEMA: SettingsSchema = {
  "storage.database_path": {
    key: "storage.database_path",
    type: "string",
    default: DEFAULT_DATABASE_PATH,
    description: "SQLite file holding committed latency events",
    reloadPolicy: "restart",
  },
  "buffer.capacity": integer("buffer.capacity", 10_000, 1, 10_000_000, "restart", "Ingestion buffer capacity in events"),
  "writer.batch_size": integer("writer.batch_size", 500, 1, 100_000, "restart", "Events per committed batch"),
  "writer.flush_interval_ms": integer(
    "writer.flush_interval_ms",
    250,
    10,
    60_000,
    "restart",
    "Longest time an accepted event waits before a flush",
  ),
  "writer.max_retries": integer("writer.max_retries", 3, 0, 20, "restart", "Commit retries per batch"),
  "writer.base_backoff_ms": integer("writer.base_backoff_ms", 50, 0, 60_000, "restart", "First retry delay"),
  "writer.max_backoff_ms": integer("writer.max_backoff_ms", 2000, 0, 600_000, "restart", "Retry delay cap"),
  "retention.max_age_days": integer(
    "retention.max_age_days",
    30,
    0,
    36_500,
    "hot",
    "Delete events older than this many days",
  ),
  "retention.max_count": integer(
    "retention.max_count",
    1_000_000,
    0,
    Number.MAX_SAFE_INTEGER,
    "hot",
    "Keep at most this many events (0 disables the cap)",
  ),
  "retention.interval_ms": integer(
    "retention.interval_ms",
    60_000,
    1000,
    86_400_000,
    "restart",
    "Time between retention cycles",
  ),
  "aggregation.exact_threshold": integer(
    "aggregation.exact_threshold",
    1_000_000,
    1,
    Number.MAX_SAFE_INTEGER,
    "restart",
    "Largest window aggregated by exact sort",
  ),
  "collectors.interval_ms": integer(
    "collectors.interval_ms",
    1000,
    0,
    3_600_000,
    "restart",
    "Process scan interval of the built-in collectors (0 disables them)",
  ),
  "server.port": integer("server.port", 3030, 0, 65_535, "restart", "HTTP query surface port"),
};

/** Return a map of all schema keys to their default values. */
export function getAllDefaults(): Record<string, unknown> {
  const defaults: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(SETTINGS_SCHEMA)) {
    defaults[k] = v.default;
  }
  return defaults;
}

/** Validate a value against the schema for the given key. */
export function validateValue(key: string, value: unknown): { valid: boolean; reason?: string } {
  const def: SettingDefinition | undefined = SETTINGS_SCHEMA[key];

  // Unknown keys are always valid (forward-compat preservation).
  if (!def) {
    return { valid: true };
  }

  if (value === null || value === undefined) {
    return { valid: false, reason: `${key}: value must not be null or undefined` };
  }

  switch (def.type) {
    case "string": {
      if (typeof value !== "string" || value.length === 0) {
        return { valid: false, reason: `${key}: expected non-empty string` };
      }
      break;
    }
    case "integer": {
      if (typeof value !== "number" || !Number.isSafeInteger(value)) {
        return { valid: false, reason: `${key}: expected integer` };
      }
      if ((def.min !== undefined && value < def.min) || (def.max !== undefined && value > def.max)) {
        return { valid: false, reason: `${key}: must be between ${def.min ?? "-inf"} and ${def.max ?? "inf"}` };
      }
      break;
    }
  }

  return { valid: true };
}
