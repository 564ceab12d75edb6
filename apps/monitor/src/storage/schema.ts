import type Database from "better-sqlite3";

export const EVENTS_TABLE = "latency_events";

/**
 * Versioned schema steps, applied in order. The applied version lives in
 * `PRAGMA user_version`, so the store needs no bookkeeping table of its own.
 * Add new steps at the end; never edit a shipped one.
 */
const MIGRATIONS: ReadonlyArray<(db: Database.Database) => void> = [
  // v1: event table and the (component, wall_timestamp) ordering key.
  (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS ${EVENTS_TABLE} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        wall_timestamp INTEGER NOT NULL,
        component TEXT NOT NULL,
        source_label TEXT NOT NULL,
        duration_us INTEGER NOT NULL CHECK (duration_us >= 0),
        success INTEGER NOT NULL,
        metadata TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_latency_events_component_ts
        ON ${EVENTS_TABLE}(component, wall_timestamp);
    `);
  },
  // v2: cross-component "most recent" scans.
  (db) => {
    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_latency_events_ts
        ON ${EVENTS_TABLE}(wall_timestamp, id);
    `);
  },
];

export const SCHEMA_VERSION = MIGRATIONS.length;

function getSchemaVersion(db: Database.Database): number {
  const version = db.pragma("user_version", { simple: true });
  return typeof version === "number" ? version : 0;
}

/** Bring the schema up to {@link SCHEMA_VERSION}. Returns the version found on disk. */
export function runMigrations(db: Database.Database): number {
  const found = getSchemaVersion(db);
  if (found > SCHEMA_VERSION) {
    throw new Error(`store schema v${found} is newer than supported v${SCHEMA_VERSION}`);
  }
  for (let v = found; v < SCHEMA_VERSION; v++) {
    const step = MIGRATIONS[v];
    if (step === undefined) {
      break;
    }
    db.transaction(() => {
      step(db);
      db.pragma(`user_version = ${v + 1}`);
    })();
  }
  return found;
}
