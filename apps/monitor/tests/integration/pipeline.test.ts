import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveMonitorConfig } from "../../src/config/resolve.js";
import { createMonitor, type Monitor, type ProcessInfo, type ProcessScanner } from "../../src/index.js";
import { SqliteEventStore } from "../../src/storage/event_store.js";
import { makeTempDir, removeTempDir } from "../helpers/fixtures.js";

let dir: string;
let dbPath: string;
let monitor: Monitor | undefined;

beforeEach(async () => {
  dir = await makeTempDir("pipeline-test");
  dbPath = join(dir, "metrics.db");
});

afterEach(async () => {
  await monitor?.shutdown();
  monitor = undefined;
  await removeTempDir(dir);
});

function start(overrides: Record<string, unknown> = {}, autoStart = true, scan?: ProcessScanner): Monitor {
  monitor = createMonitor(
    resolveMonitorConfig({
      "storage.database_path": dbPath,
      "writer.flush_interval_ms": 20,
      "writer.batch_size": 16,
      ...overrides,
    }),
    { autoStart, scan },
  );
  return monitor;
}

describe("capture to query round trip", () => {
  it("commits every captured event exactly once", async () => {
    const m = start();
    const session = m.sessions.startSession("all");
    const sampler = session.createSampler();

    await Promise.all(
      Array.from({ length: 50 }, (_, i) =>
        sampler.measure(i % 2 === 0 ? "editor" : "filesystem", `op-${i}`, async () => i),
      ),
    );
    await m.sessions.stopSession(session);

    expect(m.query.totalCount()).toBe(50);
    expect(m.query.counters()).toMatchObject({ submitted: 50, accepted: 50, committed_events: 50, dropped: 0 });
    expect(m.query.summary("1h")).toMatchObject({ count: 50, error_rate: 0 });
    for (const event of m.query.rawEvents(50)) {
      expect(event.duration_us).toBeGreaterThanOrEqual(0);
    }
  });

  it("flushes on the interval while the session runs", async () => {
    const m = start();
    const sampler = m.sessions.startSession(["terminal"]).createSampler();
    sampler.begin("terminal", "spawn").end(true);

    await expect.poll(() => m.query.totalCount(), { timeout: 2000 }).toBe(1);
  });

  it("conserves events under overflow", async () => {
    const m = start({ "buffer.capacity": 100 }, false);
    const sampler = m.createSampler();
    for (let i = 0; i < 250; i++) {
      sampler.begin("network", "burst").end(true);
    }
    await m.writer.flush();

    const counters = m.query.counters();
    expect(counters.dropped).toBe(150);
    expect(counters.accepted).toBe(100);
    expect(counters.committed_events + counters.lost_events).toBe(counters.accepted);
    expect(m.query.droppedCount()).toBe(150);
  });

  it("empties the store with a zero max age", async () => {
    const m = start({}, false);
    const sampler = m.createSampler();
    for (let i = 0; i < 10; i++) sampler.begin("editor", "type").end(true);
    await m.writer.flush();

    m.retention.updatePolicy({ max_age_us: 0 });
    await m.retention.runOnce();

    expect(m.query.totalCount()).toBe(0);
    expect(m.query.counters().retention_deleted).toBe(10);
  });

  it("drains buffered events on shutdown and keeps them across restart", async () => {
    const m = start({ "writer.flush_interval_ms": 60_000, "writer.batch_size": 1000 });
    const sampler = m.createSampler();
    for (let i = 0; i < 5; i++) sampler.begin("assistant", "ask").end(true);

    await m.shutdown();
    monitor = undefined;

    const reopened = SqliteEventStore.open(dbPath);
    try {
      expect(reopened.reader.totalCount()).toBe(5);
    } finally {
      reopened.close();
    }
  });
});

describe("built-in collectors", () => {
  const editorOnly: ProcessInfo[] = [{ pid: 9, name: "code", command: "code .", cpu_percent: 1 }];

  it("feed process scans into the store until shutdown", async () => {
    const scan = vi.fn(() => Promise.resolve(editorOnly));
    const m = start({ "collectors.interval_ms": 20 }, true, scan);
    m.startCollection();

    await expect.poll(() => m.query.rawEvents(1, "editor").length, { timeout: 2000 }).toBe(1);
    expect(m.query.rawEvents(1, "editor")[0]).toMatchObject({
      source_label: "editor_process_scan",
      success: true,
      metadata: { matched: "1" },
    });

    await m.shutdown();
    const calls = scan.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 100));
    expect(scan).toHaveBeenCalledTimes(calls);
  });

  it("starts only the session when collectors are disabled", async () => {
    const scan = vi.fn(() => Promise.resolve(editorOnly));
    const m = start({ "collectors.interval_ms": 0 }, true, scan);
    const session = m.startCollection();

    expect(m.sessions.list().map((info) => info.id)).toEqual([session.id]);
    await m.shutdown();
    expect(scan).not.toHaveBeenCalled();
  });
});
