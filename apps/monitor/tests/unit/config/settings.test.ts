import { writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveMonitorConfig, resolveRetentionPolicy } from "../../../src/config/resolve.js";
import { DEFAULT_DATABASE_PATH, getAllDefaults, SETTINGS_SCHEMA, validateValue } from "../../../src/config/schema.js";
import { SettingsManager } from "../../../src/config/settings.js";
import { JsonSettingsStore } from "../../../src/config/store.js";
import { makeTempDir, removeTempDir } from "../../helpers/fixtures.js";

let dir: string;
let filePath: string;

beforeEach(async () => {
  dir = await makeTempDir("settings-test");
  filePath = join(dir, "settings.json");
});

afterEach(async () => {
  await removeTempDir(dir);
});

async function createManager(): Promise<SettingsManager> {
  const settings = new SettingsManager(SETTINGS_SCHEMA, new JsonSettingsStore(filePath, SETTINGS_SCHEMA));
  await settings.init({ watch: false });
  return settings;
}

describe("validateValue", () => {
  it("checks integer type and range", () => {
    expect(validateValue("writer.batch_size", 500)).toEqual({ valid: true });
    expect(validateValue("writer.batch_size", 0)).toEqual({
      valid: false,
      reason: "writer.batch_size: must be between 1 and 100000",
    });
    expect(validateValue("writer.batch_size", 2.5)).toEqual({ valid: false, reason: "writer.batch_size: expected integer" });
    expect(validateValue("storage.database_path", "")).toEqual({
      valid: false,
      reason: "storage.database_path: expected non-empty string",
    });
  });

  it("accepts any value for keys outside the schema", () => {
    expect(validateValue("future.flag", null)).toEqual({ valid: true });
  });
});

describe("SettingsManager", () => {
  it("starts from defaults", async () => {
    const settings = await createManager();
    expect(settings.getAll()).toEqual(getAllDefaults());
    expect(settings.get("buffer.capacity")).toBe(10_000);
  });

  it("ignores invalid persisted values", async () => {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, JSON.stringify({ "buffer.capacity": -3, "server.port": 8080 }));

    const settings = await createManager();
    expect(settings.get("buffer.capacity")).toBe(10_000);
    expect(settings.get("server.port")).toBe(8080);
  });

  it("persists and announces a hot change", async () => {
    const settings = await createManager();
    const listener = vi.fn();
    settings.onSettingChanged(listener);

    await settings.set("retention.max_age_days", 7);

    expect(listener).toHaveBeenCalledWith({
      key: "retention.max_age_days",
      oldValue: 30,
      newValue: 7,
      reloadPolicy: "hot",
    });
    expect(settings.isRestartRequired()).toBe(false);
    expect((await createManager()).get("retention.max_age_days")).toBe(7);
  });

  it("tracks restart-required changes", async () => {
    const settings = await createManager();
    await settings.set("writer.batch_size", 100);

    expect(settings.isRestartRequired()).toBe(true);
    expect(settings.getChangedRestartSettings()).toEqual(["writer.batch_size"]);
  });

  it("rejects an invalid value without persisting it", async () => {
    const settings = await createManager();
    await expect(settings.set("server.port", 70_000)).rejects.toThrow("server.port: must be between 0 and 65535");
    expect(settings.get("server.port")).toBe(3030);
  });

  it("resets a key to its default", async () => {
    const settings = await createManager();
    await settings.set("server.port", 4000);
    await settings.reset("server.port");
    expect(settings.get("server.port")).toBe(3030);
  });

  it("stops notifying after unsubscribe", async () => {
    const settings = await createManager();
    const listener = vi.fn();
    const unsubscribe = settings.onSettingChanged(listener);
    unsubscribe();

    await settings.set("retention.max_count", 10);
    expect(listener).not.toHaveBeenCalled();
  });
});

describe("resolveMonitorConfig", () => {
  it("maps defaults to the typed config", () => {
    expect(resolveMonitorConfig(getAllDefaults())).toEqual({
      databasePath: DEFAULT_DATABASE_PATH,
      bufferCapacity: 10_000,
      writer: { batchSize: 500, flushIntervalMs: 250, maxRetries: 3, baseBackoffMs: 50, maxBackoffMs: 2000 },
      retention: { max_age_us: 30 * 86_400_000_000, max_count: 1_000_000 },
      retentionIntervalMs: 60_000,
      exactThreshold: 1_000_000,
      collectorIntervalMs: 1000,
      port: 3030,
    });
  });

  it("treats a zero count cap as no cap", () => {
    expect(resolveRetentionPolicy({ "retention.max_count": 0, "retention.max_age_days": 0 })).toEqual({ max_age_us: 0 });
  });

  it("falls back to defaults for missing or invalid values", () => {
    expect(resolveMonitorConfig({ "server.port": "80" }).port).toBe(3030);
  });
});
