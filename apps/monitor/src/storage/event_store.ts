/**
 * Durable, time-indexed latency event store on SQLite.
 *
 * Two connections to one file: a write connection handed out as the single
 * {@link EventWriteHandle}, and a read-only connection behind
 * {@link EventReader}. WAL journaling lets readers run while a batch commits.
 *
 * @module
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { isComponent, type Component, type LatencyEvent, type PendingEvent } from "../capture/types.js";
import { StorageInitError, WriteHandleOwnedError } from "../errors.js";
import { EVENTS_TABLE, runMigrations, SCHEMA_VERSION } from "./schema.js";
import type {
  AppendResult,
  EventReader,
  EventWriteHandle,
  RangeTotals,
  RetentionPolicy,
  RetentionResult,
  TimeRange,
} from "./types.js";

// ── Row mapping ────────────────────────────────────────────────────────

interface EventRow {
  id: number;
  wall_timestamp: number;
  component: string;
  source_label: string;
  duration_us: number;
  success: number;
  metadata: string | null;
}

interface InsertParams {
  wall_timestamp: number;
  component: string;
  source_label: string;
  duration_us: number;
  success: number;
  metadata: string | null;
}

interface RangeParams {
  start: number;
  end: number;
}

interface ComponentRangeParams extends RangeParams {
  component: string;
}

interface TotalsRow {
  count: number;
  sum_us: number | null;
  min_us: number | null;
  max_us: number | null;
  failures: number | null;
}

const EVENT_COLUMNS = "id, wall_timestamp, component, source_label, duration_us, success, metadata";

function parseMetadata(raw: string | null): Record<string, string> {
  if (raw === null || raw.length === 0) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    return {};
  }
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string") {
      out[key] = value;
    }
  }
  return out;
}

function toEvent(row: EventRow): LatencyEvent {
  return Object.freeze({
    id: row.id,
    wall_timestamp: row.wall_timestamp,
    // Only this store writes rows, so an unknown tag means a newer writer added it.
    component: isComponent(row.component) ? row.component : "system",
    source_label: row.source_label,
    duration_us: row.duration_us,
    success: row.success !== 0,
    metadata: Object.freeze(parseMetadata(row.metadata)),
  });
}

function toInsertParams(event: PendingEvent): InsertParams {
  const hasMetadata = Object.keys(event.metadata).length > 0;
  return {
    wall_timestamp: event.wall_timestamp,
    component: event.component,
    source_label: event.source_label,
    duration_us: event.duration_us,
    success: event.success ? 1 : 0,
    metadata: hasMetadata ? JSON.stringify(event.metadata) : null,
  };
}

// ── Write handle ───────────────────────────────────────────────────────

class SqliteWriteHandle implements EventWriteHandle {
  private readonly insert: Database.Statement<InsertParams>;
  private readonly deleteOlder: Database.Statement<{ cutoff: number }>;
  private readonly deleteAll: Database.Statement<[]>;
  private readonly countAll: Database.Statement<[], { n: number }>;
  private readonly evictOldest: Database.Statement<{ excess: number }>;
  private readonly appendTx: (events: readonly PendingEvent[]) => AppendResult;
  private readonly retentionTx: (policy: RetentionPolicy, nowUs: number) => RetentionResult;
  private released = false;

  constructor(
    db: Database.Database,
    private readonly onRelease: () => void,
  ) {
    this.insert = db.prepare<InsertParams>(
      `INSERT INTO ${EVENTS_TABLE} (wall_timestamp, component, source_label, duration_us, success, metadata)
       VALUES (@wall_timestamp, @component, @source_label, @duration_us, @success, @metadata)`,
    );
    this.deleteOlder = db.prepare<{ cutoff: number }>(
      `DELETE FROM ${EVENTS_TABLE} WHERE wall_timestamp <= @cutoff`,
    );
    this.deleteAll = db.prepare<[]>(`DELETE FROM ${EVENTS_TABLE}`);
    this.countAll = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${EVENTS_TABLE}`);
    this.evictOldest = db.prepare<{ excess: number }>(
      `DELETE FROM ${EVENTS_TABLE} WHERE id IN (
         SELECT id FROM ${EVENTS_TABLE} ORDER BY wall_timestamp ASC, id ASC LIMIT @excess
       )`,
    );

    this.appendTx = db.transaction((events: readonly PendingEvent[]): AppendResult => {
      let first: number | null = null;
      let last: number | null = null;
      for (const event of events) {
        const id = Number(this.insert.run(toInsertParams(event)).lastInsertRowid);
        if (first === null) {
          first = id;
        }
        last = id;
      }
      return { count: events.length, first_id: first, last_id: last };
    });

    this.retentionTx = db.transaction((policy: RetentionPolicy, nowUs: number): RetentionResult => {
      let deletedByAge = 0;
      if (policy.max_age_us === 0) {
        // Producers clamp stamps forward across a backward clock step, so rows
        // may sit after `nowUs`; a zero age still removes them.
        deletedByAge = this.deleteAll.run().changes;
      } else if (policy.max_age_us !== undefined) {
        deletedByAge = this.deleteOlder.run({ cutoff: nowUs - policy.max_age_us }).changes;
      }

      let remaining = this.countAll.get()?.n ?? 0;
      let deletedByCount = 0;
      if (policy.max_count !== undefined && remaining > policy.max_count) {
        deletedByCount = this.evictOldest.run({ excess: remaining - policy.max_count }).changes;
        remaining -= deletedByCount;
      }

      return { deleted_by_age: deletedByAge, deleted_by_count: deletedByCount, remaining };
    });
  }

  appendBatch(events: readonly PendingEvent[]): AppendResult {
    this.assertOwned();
    if (events.length === 0) {
      return { count: 0, first_id: null, last_id: null };
    }
    return this.appendTx(events);
  }

  enforceRetention(policy: RetentionPolicy, nowUs: number): RetentionResult {
    this.assertOwned();
    return this.retentionTx(policy, nowUs);
  }

  release(): void {
    if (!this.released) {
      this.released = true;
      this.onRelease();
    }
  }

  private assertOwned(): void {
    if (this.released) {
      throw new Error("write handle used after release");
    }
  }
}

// ── Reader ─────────────────────────────────────────────────────────────

/** Prepared statement pair: one for all components, one filtered by component. */
interface Scoped<R> {
  all: Database.Statement<RangeParams, R>;
  one: Database.Statement<ComponentRangeParams, R>;
}

class SqliteEventReader implements EventReader {
  private readonly recentAll: Database.Statement<{ limit: number }, EventRow>;
  private readonly recentOne: Database.Statement<{ limit: number; component: string }, EventRow>;
  private readonly count: Scoped<{ n: number }>;
  private readonly totals: Scoped<TotalsRow>;
  private readonly durations: Scoped<{ duration_us: number }>;
  private readonly rows: Scoped<EventRow>;
  private readonly components: Database.Statement<RangeParams, { component: string }>;
  private readonly total: Database.Statement<[], { n: number }>;
  private readonly last: Database.Statement<[], EventRow>;
  private readonly pingStmt: Database.Statement<[], { ok: number }>;

  constructor(private readonly db: Database.Database) {
    const inRange = "wall_timestamp >= @start AND wall_timestamp < @end";
    const scoped = <R>(select: string, suffix = ""): Scoped<R> => ({
      all: db.prepare<RangeParams, R>(`${select} WHERE ${inRange} ${suffix}`),
      one: db.prepare<ComponentRangeParams, R>(
        `${select} WHERE component = @component AND ${inRange} ${suffix}`,
      ),
    });

    this.recentAll = db.prepare<{ limit: number }, EventRow>(
      `SELECT ${EVENT_COLUMNS} FROM ${EVENTS_TABLE} ORDER BY wall_timestamp DESC, id DESC LIMIT @limit`,
    );
    this.recentOne = db.prepare<{ limit: number; component: string }, EventRow>(
      `SELECT ${EVENT_COLUMNS} FROM ${EVENTS_TABLE} WHERE component = @component
       ORDER BY wall_timestamp DESC, id DESC LIMIT @limit`,
    );
    this.count = scoped(`SELECT COUNT(*) AS n FROM ${EVENTS_TABLE}`);
    this.totals = scoped(
      `SELECT COUNT(*) AS count, TOTAL(duration_us) AS sum_us, MIN(duration_us) AS min_us,
              MAX(duration_us) AS max_us, SUM(CASE WHEN success = 0 THEN 1 ELSE 0 END) AS failures
       FROM ${EVENTS_TABLE}`,
    );
    this.durations = scoped(`SELECT duration_us FROM ${EVENTS_TABLE}`, "ORDER BY duration_us ASC");
    this.rows = scoped(`SELECT ${EVENT_COLUMNS} FROM ${EVENTS_TABLE}`, "ORDER BY wall_timestamp ASC, id ASC");
    this.components = db.prepare<RangeParams, { component: string }>(
      `SELECT DISTINCT component FROM ${EVENTS_TABLE} WHERE ${inRange} ORDER BY component`,
    );
    this.total = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${EVENTS_TABLE}`);
    this.last = db.prepare<[], EventRow>(
      `SELECT ${EVENT_COLUMNS} FROM ${EVENTS_TABLE} ORDER BY wall_timestamp DESC, id DESC LIMIT 1`,
    );
    this.pingStmt = db.prepare<[], { ok: number }>("SELECT 1 AS ok");
  }

  consistent<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  recent(limit: number, component?: Component): LatencyEvent[] {
    const rows =
      component === undefined
        ? this.recentAll.all({ limit })
        : this.recentOne.all({ limit, component });
    return rows.map(toEvent);
  }

  countInRange(range: TimeRange, component?: Component): number {
    const row =
      component === undefined
        ? this.count.all.get(span(range))
        : this.count.one.get(scope(range, component));
    return row?.n ?? 0;
  }

  rangeTotals(range: TimeRange, component?: Component): RangeTotals {
    const row =
      component === undefined
        ? this.totals.all.get(span(range))
        : this.totals.one.get(scope(range, component));
    return {
      count: row?.count ?? 0,
      sum_us: row?.sum_us ?? 0,
      min_us: row?.min_us ?? null,
      max_us: row?.max_us ?? null,
      failures: row?.failures ?? 0,
    };
  }

  sortedDurations(range: TimeRange, component?: Component): number[] {
    const rows =
      component === undefined
        ? this.durations.all.all(span(range))
        : this.durations.one.all(scope(range, component));
    return rows.map((row) => row.duration_us);
  }

  *iterateDurations(range: TimeRange, component?: Component): IterableIterator<number> {
    const rows =
      component === undefined
        ? this.durations.all.iterate(span(range))
        : this.durations.one.iterate(scope(range, component));
    for (const row of rows) {
      yield row.duration_us;
    }
  }

  *exportRange(range: TimeRange, component?: Component): IterableIterator<LatencyEvent> {
    const rows =
      component === undefined
        ? this.rows.all.iterate(span(range))
        : this.rows.one.iterate(scope(range, component));
    for (const row of rows) {
      yield toEvent(row);
    }
  }

  componentsInRange(range: TimeRange): Component[] {
    return this.components
      .all(span(range))
      .map((row) => row.component)
      .filter(isComponent);
  }

  totalCount(): number {
    return this.total.get()?.n ?? 0;
  }

  lastEvent(): LatencyEvent | undefined {
    const row = this.last.get();
    return row === undefined ? undefined : toEvent(row);
  }

  ping(): boolean {
    try {
      return this.pingStmt.get()?.ok === 1;
    } catch (err) {
      console.warn("[storage] Read connection ping failed:", err);
      return false;
    }
  }
}

function span(range: TimeRange): RangeParams {
  return { start: range.start, end: range.end };
}

function scope(range: TimeRange, component: Component): ComponentRangeParams {
  return { start: range.start, end: range.end, component };
}

// ── Store ──────────────────────────────────────────────────────────────

export interface EventStoreOptions {
  /** Milliseconds a connection waits on a locked database before failing. */
  busyTimeoutMs?: number;
}

export class SqliteEventStore {
  readonly path: string;
  readonly reader: EventReader;
  private readonly writeDb: Database.Database;
  private readonly readDb: Database.Database;
  private writerOwned = false;
  private closed = false;

  private constructor(path: string, writeDb: Database.Database, readDb: Database.Database) {
    this.path = path;
    this.writeDb = writeDb;
    this.readDb = readDb;
    this.reader = new SqliteEventReader(readDb);
  }

  /**
   * Create (or open) the store file, migrate it, and open both connections.
   * @throws StorageInitError if the store cannot be created at all.
   */
  static open(path: string, options: EventStoreOptions = {}): SqliteEventStore {
    const busyTimeout = options.busyTimeoutMs ?? 5000;
    let writeDb: Database.Database | undefined;
    try {
      mkdirSync(dirname(path), { recursive: true });
      writeDb = new Database(path);
      writeDb.pragma("journal_mode = WAL");
      writeDb.pragma("synchronous = FULL");
      writeDb.pragma(`busy_timeout = ${busyTimeout}`);
      const found = runMigrations(writeDb);

      const readDb = new Database(path, { readonly: true, fileMustExist: true });
      readDb.pragma(`busy_timeout = ${busyTimeout}`);

      console.info(`[storage] Latency store opened at ${path} (schema v${found} -> v${SCHEMA_VERSION})`);
      return new SqliteEventStore(path, writeDb, readDb);
    } catch (err) {
      writeDb?.close();
      throw new StorageInitError(path, err);
    }
  }

  /**
   * Hand out the only write handle. The owner keeps it until it calls
   * `release()`; a second acquisition before that fails.
   */
  acquireWriter(): EventWriteHandle {
    if (this.closed) {
      throw new Error("latency store is closed");
    }
    if (this.writerOwned) {
      throw new WriteHandleOwnedError();
    }
    this.writerOwned = true;
    return new SqliteWriteHandle(this.writeDb, () => {
      this.writerOwned = false;
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.readDb.close();
    this.writeDb.close();
  }
}
