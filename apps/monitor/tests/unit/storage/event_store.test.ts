import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ManualClock } from "../../../src/capture/clock.js";
import { Sampler } from "../../../src/capture/sampler.js";
import type { PendingEvent } from "../../../src/capture/types.js";
import { StorageInitError, WriteHandleOwnedError } from "../../../src/errors.js";
import { PipelineCounters } from "../../../src/ingest/counters.js";
import { SqliteEventStore } from "../../../src/storage/event_store.js";
import { SCHEMA_VERSION } from "../../../src/storage/schema.js";
import { BASE_WALL_US, makeEvent, makeTempDir, removeTempDir } from "../../helpers/fixtures.js";

let dir: string;
let store: SqliteEventStore;

beforeEach(async () => {
  dir = await makeTempDir("event-store-test");
  store = SqliteEventStore.open(join(dir, "nested", "metrics.db"));
});

afterEach(async () => {
  store.close();
  await removeTempDir(dir);
});

describe("SqliteEventStore.open", () => {
  it("creates the parent directory and migrates to the current schema", () => {
    const db = new Database(join(dir, "nested", "metrics.db"), { readonly: true });
    expect(db.pragma("user_version", { simple: true })).toBe(SCHEMA_VERSION);
    db.close();
  });

  it("fails with StorageInitError when the path cannot be created", async () => {
    const blocker = join(dir, "not-a-dir");
    await writeFile(blocker, "x");
    expect(() => SqliteEventStore.open(join(blocker, "metrics.db"))).toThrow(StorageInitError);
  });

  it("keeps committed events across reopen", () => {
    const writer = store.acquireWriter();
    writer.appendBatch([makeEvent(), makeEvent()]);
    writer.release();
    store.close();

    store = SqliteEventStore.open(join(dir, "nested", "metrics.db"));
    expect(store.reader.totalCount()).toBe(2);
  });
});

describe("write handle", () => {
  it("is handed out once until released", () => {
    const first = store.acquireWriter();
    expect(() => store.acquireWriter()).toThrow(WriteHandleOwnedError);
    first.release();
    expect(() => store.acquireWriter()).not.toThrow();
  });

  it("assigns increasing ids to an appended batch", () => {
    const writer = store.acquireWriter();
    expect(writer.appendBatch([makeEvent(), makeEvent(), makeEvent()])).toEqual({
      count: 3,
      first_id: 1,
      last_id: 3,
    });
    expect(writer.appendBatch([])).toEqual({ count: 0, first_id: null, last_id: null });
  });

  it("never reuses ids of deleted events", () => {
    const writer = store.acquireWriter();
    writer.appendBatch([makeEvent(), makeEvent()]);
    writer.enforceRetention({ max_age_us: 0 }, BASE_WALL_US);
    expect(writer.appendBatch([makeEvent()]).first_id).toBe(3);
  });

  it("deletes events at or before now minus max_age", () => {
    const writer = store.acquireWriter();
    writer.appendBatch([
      makeEvent({ wall_timestamp: BASE_WALL_US - 2000 }),
      makeEvent({ wall_timestamp: BASE_WALL_US - 1000 }),
      makeEvent({ wall_timestamp: BASE_WALL_US }),
    ]);

    expect(writer.enforceRetention({ max_age_us: 1000 }, BASE_WALL_US)).toEqual({
      deleted_by_age: 2,
      deleted_by_count: 0,
      remaining: 1,
    });
  });

  it("empties the store when max_age is zero", () => {
    const writer = store.acquireWriter();
    writer.appendBatch([makeEvent({ wall_timestamp: BASE_WALL_US - 5 }), makeEvent()]);

    writer.enforceRetention({ max_age_us: 0 }, BASE_WALL_US);
    expect(store.reader.totalCount()).toBe(0);
  });

  it("empties the store at max_age zero even when rows are stamped after now", () => {
    const writer = store.acquireWriter();
    writer.appendBatch([makeEvent({ wall_timestamp: BASE_WALL_US + 2_000_000 }), makeEvent()]);

    expect(writer.enforceRetention({ max_age_us: 0 }, BASE_WALL_US)).toEqual({
      deleted_by_age: 2,
      deleted_by_count: 0,
      remaining: 0,
    });
  });

  it("empties the store at max_age zero after the wall clock steps back", () => {
    const clock = new ManualClock(BASE_WALL_US);
    const captured: PendingEvent[] = [];
    const sampler = new Sampler({ push: (event) => captured.push(event) }, new PipelineCounters(), {
      clock,
      wallClock: clock,
    });
    sampler.begin("editor", "a").end(true);
    clock.setWallMicros(BASE_WALL_US - 2_000_000);
    sampler.begin("editor", "b").end(true);
    expect(captured.map((e) => e.wall_timestamp)).toEqual([BASE_WALL_US, BASE_WALL_US]);

    const writer = store.acquireWriter();
    writer.appendBatch(captured);
    writer.enforceRetention({ max_age_us: 0 }, clock.nowMicros());
    expect(store.reader.totalCount()).toBe(0);
  });

  it("evicts the oldest events beyond max_count", () => {
    const writer = store.acquireWriter();
    writer.appendBatch([
      makeEvent({ wall_timestamp: BASE_WALL_US + 3, source_label: "c" }),
      makeEvent({ wall_timestamp: BASE_WALL_US + 1, source_label: "a" }),
      makeEvent({ wall_timestamp: BASE_WALL_US + 4, source_label: "d" }),
      makeEvent({ wall_timestamp: BASE_WALL_US + 2, source_label: "b" }),
    ]);

    expect(writer.enforceRetention({ max_count: 2 }, BASE_WALL_US)).toEqual({
      deleted_by_age: 0,
      deleted_by_count: 2,
      remaining: 2,
    });
    expect(store.reader.recent(10).map((e) => e.source_label)).toEqual(["d", "c"]);
  });

  it("rejects use after release", () => {
    const writer = store.acquireWriter();
    writer.release();
    expect(() => writer.appendBatch([makeEvent()])).toThrow("write handle used after release");
  });
});

describe("reader", () => {
  function seed(): void {
    const writer = store.acquireWriter();
    writer.appendBatch([
      makeEvent({ wall_timestamp: BASE_WALL_US + 100, duration_us: 10, component: "editor" }),
      makeEvent({ wall_timestamp: BASE_WALL_US + 200, duration_us: 30, component: "network", success: false }),
      makeEvent({ wall_timestamp: BASE_WALL_US + 200, duration_us: 20, component: "editor" }),
      makeEvent({ wall_timestamp: BASE_WALL_US + 300, duration_us: 40, metadata: { file: "a.ts" } }),
    ]);
    writer.release();
  }

  it("returns recent events newest first, ties by id descending", () => {
    seed();
    expect(store.reader.recent(3).map((e) => e.id)).toEqual([4, 3, 2]);
    expect(store.reader.recent(10, "network").map((e) => e.id)).toEqual([2]);
  });

  it("round-trips metadata and success", () => {
    seed();
    const [latest] = store.reader.recent(1);
    expect(latest).toEqual({
      id: 4,
      wall_timestamp: BASE_WALL_US + 300,
      component: "editor",
      source_label: "op",
      duration_us: 40,
      success: true,
      metadata: { file: "a.ts" },
    });
    expect(store.reader.recent(1, "network")[0]?.success).toBe(false);
  });

  it("treats ranges as half-open", () => {
    seed();
    const range = { start: BASE_WALL_US + 100, end: BASE_WALL_US + 300 };
    expect(store.reader.countInRange(range)).toBe(3);
    expect(store.reader.countInRange(range, "editor")).toBe(2);
  });

  it("computes range totals", () => {
    seed();
    const range = { start: BASE_WALL_US, end: BASE_WALL_US + 1000 };
    expect(store.reader.rangeTotals(range)).toEqual({
      count: 4,
      sum_us: 100,
      min_us: 10,
      max_us: 40,
      failures: 1,
    });
    expect(store.reader.rangeTotals({ start: 0, end: 1 })).toEqual({
      count: 0,
      sum_us: 0,
      min_us: null,
      max_us: null,
      failures: 0,
    });
  });

  it("returns sorted durations and streams them", () => {
    seed();
    const range = { start: BASE_WALL_US, end: BASE_WALL_US + 1000 };
    expect(store.reader.sortedDurations(range)).toEqual([10, 20, 30, 40]);
    expect([...store.reader.iterateDurations(range, "editor")]).toEqual([10, 20, 40]);
  });

  it("exports a range in wall order", () => {
    seed();
    const range = { start: BASE_WALL_US, end: BASE_WALL_US + 1000 };
    expect([...store.reader.exportRange(range)].map((e) => e.id)).toEqual([1, 2, 3, 4]);
    expect(store.reader.componentsInRange(range)).toEqual(["editor", "network"]);
  });

  it("reports the last event and answers a ping", () => {
    expect(store.reader.lastEvent()).toBeUndefined();
    seed();
    expect(store.reader.lastEvent()?.id).toBe(4);
    expect(store.reader.ping()).toBe(true);
  });
});
