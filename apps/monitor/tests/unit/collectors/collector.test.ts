import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ManualClock } from "../../../src/capture/clock.js";
import { Sampler } from "../../../src/capture/sampler.js";
import type { PendingEvent } from "../../../src/capture/types.js";
import { createProcessCollectors, ProcessCollector } from "../../../src/collectors/collector.js";
import type { ProcessInfo } from "../../../src/collectors/process_table.js";
import { MODEL_MATCHERS, WORKSPACE_MATCHERS } from "../../../src/collectors/matchers.js";
import { PipelineCounters } from "../../../src/ingest/counters.js";
import { BASE_WALL_US } from "../../helpers/fixtures.js";

const PROCESSES: ProcessInfo[] = [
  { pid: 1, name: "code", command: "/usr/share/code/code --type=renderer", cpu_percent: 2 },
  { pid: 2, name: "node", command: "/usr/share/code/code --type=extensionHost", cpu_percent: 1 },
  { pid: 3, name: "bash", command: "-bash", cpu_percent: 0.5 },
  { pid: 4, name: "zsh", command: "zsh", cpu_percent: 0 },
  { pid: 5, name: "ollama", command: "/usr/local/bin/ollama serve", cpu_percent: 4 },
  {
    pid: 6,
    name: "node",
    command: "node /home/dev/.vscode/extensions/github.copilot-1.0.0/dist/language-server.js",
    cpu_percent: 1,
  },
];

let clock: ManualClock;
let captured: PendingEvent[];
let sampler: Sampler;

beforeEach(() => {
  clock = new ManualClock(BASE_WALL_US);
  captured = [];
  sampler = new Sampler({ push: (event) => captured.push(event) }, new PipelineCounters(), {
    clock,
    wallClock: clock,
  });
});

afterEach(() => {
  vi.useRealTimers();
});

describe("ProcessCollector.tick", () => {
  it("records one event per matcher timed by the scan", async () => {
    const scan = async (): Promise<ProcessInfo[]> => {
      clock.advanceMicros(1500);
      return PROCESSES;
    };
    const collector = new ProcessCollector(sampler, { name: "workspace", matchers: WORKSPACE_MATCHERS, intervalMs: 100, scan });

    expect(await collector.tick()).toEqual([
      { component: "editor", matched: 1 },
      { component: "extension", matched: 1 },
      { component: "terminal", matched: 1 },
    ]);
    expect(captured.map((e) => [e.component, e.source_label, e.duration_us, e.success, e.metadata])).toEqual([
      ["editor", "editor_process_scan", 1500, true, { matched: "1" }],
      ["extension", "extension_host_scan", 1500, true, { matched: "1" }],
      ["terminal", "terminal_process_scan", 1500, true, { matched: "1" }],
    ]);
  });

  it("finds assistant and local model processes", async () => {
    const collector = new ProcessCollector(sampler, {
      name: "models",
      matchers: MODEL_MATCHERS,
      intervalMs: 100,
      scan: () => Promise.resolve(PROCESSES),
    });

    expect(await collector.tick()).toEqual([
      { component: "assistant", matched: 1 },
      { component: "local_model", matched: 1 },
    ]);
  });

  it("records failed events when the scan fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const collector = new ProcessCollector(sampler, {
      name: "models",
      matchers: MODEL_MATCHERS,
      intervalMs: 100,
      scan: () => Promise.reject(new Error("ps: not found")),
    });

    expect(await collector.tick()).toEqual([
      { component: "assistant", matched: null },
      { component: "local_model", matched: null },
    ]);
    expect(captured.map((e) => [e.success, e.metadata])).toEqual([
      [false, { error: "ps: not found" }],
      [false, { error: "ps: not found" }],
    ]);
    expect(warn).toHaveBeenCalledWith("[collector] models process scan failed: ps: not found");
    warn.mockRestore();
  });

  it("shares a tick that is still running", async () => {
    let release: (processes: ProcessInfo[]) => void = () => undefined;
    const scan = vi.fn(
      () =>
        new Promise<ProcessInfo[]>((resolve) => {
          release = resolve;
        }),
    );
    const collector = new ProcessCollector(sampler, { name: "workspace", matchers: WORKSPACE_MATCHERS, intervalMs: 100, scan });

    const first = collector.tick();
    const second = collector.tick();
    release([]);

    expect(await first).toBe(await second);
    expect(scan).toHaveBeenCalledTimes(1);
  });

  it("rejects a non-positive interval or an empty matcher list", () => {
    expect(() => new ProcessCollector(sampler, { name: "x", matchers: WORKSPACE_MATCHERS, intervalMs: 0 })).toThrow(
      RangeError,
    );
    expect(() => new ProcessCollector(sampler, { name: "x", matchers: [], intervalMs: 100 })).toThrow(
      "collector x needs at least one matcher",
    );
  });
});

describe("ProcessCollector timer", () => {
  it("ticks on its interval until stopped", async () => {
    vi.useFakeTimers();
    const scan = vi.fn(() => Promise.resolve(PROCESSES));
    const collector = new ProcessCollector(sampler, { name: "workspace", matchers: WORKSPACE_MATCHERS, intervalMs: 100, scan });

    collector.start();
    await vi.advanceTimersByTimeAsync(250);
    expect(scan).toHaveBeenCalledTimes(2);

    await collector.stop();
    await vi.advanceTimersByTimeAsync(500);
    expect(scan).toHaveBeenCalledTimes(2);
  });

  it("waits for a running tick when stopped", async () => {
    let release: (processes: ProcessInfo[]) => void = () => undefined;
    const scan = (): Promise<ProcessInfo[]> =>
      new Promise((resolve) => {
        release = resolve;
      });
    const collector = new ProcessCollector(sampler, { name: "workspace", matchers: WORKSPACE_MATCHERS, intervalMs: 100, scan });

    const running = collector.tick();
    const stopping = collector.stop();
    release(PROCESSES);
    await stopping;

    expect(captured).toHaveLength(3);
    await running;
  });
});

describe("createProcessCollectors", () => {
  it("scans model processes at half the workspace rate", async () => {
    vi.useFakeTimers();
    const scan = vi.fn(() => Promise.resolve(PROCESSES));
    const collectors = createProcessCollectors(sampler, 100, scan);
    for (const collector of collectors) {
      collector.start();
    }

    await vi.advanceTimersByTimeAsync(200);
    await Promise.all(collectors.map((collector) => collector.stop()));

    expect(collectors.map((collector) => collector.name)).toEqual(["workspace", "models"]);
    // Two workspace ticks, one model tick.
    expect(scan).toHaveBeenCalledTimes(3);
    expect(captured.filter((e) => e.component === "local_model")).toHaveLength(1);
  });
});
