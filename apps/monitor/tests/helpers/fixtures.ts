import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { PendingEvent } from "../../src/capture/types.js";
import type { AppendResult, EventWriteHandle, RetentionPolicy, RetentionResult } from "../../src/storage/types.js";

export const BASE_WALL_US = 1_700_000_000_000_000;

export function makeEvent(overrides: Partial<PendingEvent> = {}): PendingEvent {
  return Object.freeze({
    wall_timestamp: BASE_WALL_US,
    component: "editor",
    source_label: "op",
    duration_us: 100,
    success: true,
    metadata: {},
    ...overrides,
  });
}

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * In-memory write handle. Records every committed batch and fails the next
 * `failNext` append calls.
 */
export class RecordingWriteHandle implements EventWriteHandle {
  readonly batches: PendingEvent[][] = [];
  failNext = 0;
  appendCalls = 0;
  released = false;
  private nextId = 1;

  get committed(): PendingEvent[] {
    return this.batches.flat();
  }

  appendBatch(events: readonly PendingEvent[]): AppendResult {
    this.appendCalls += 1;
    if (this.failNext > 0) {
      this.failNext -= 1;
      throw new Error("disk I/O error");
    }
    this.batches.push([...events]);
    const first = this.nextId;
    this.nextId += events.length;
    return { count: events.length, first_id: first, last_id: this.nextId - 1 };
  }

  enforceRetention(_policy: RetentionPolicy, _nowUs: number): RetentionResult {
    return { deleted_by_age: 0, deleted_by_count: 0, remaining: this.committed.length };
  }

  release(): void {
    this.released = true;
  }
}
