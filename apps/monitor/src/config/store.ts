import { watch as fsWatch, type FSWatcher } from "node:fs";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { SettingsSchema, SettingsStore } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * JSON-file-backed settings store. Keys outside the schema are kept in memory
 * and written back untouched; edits made by other processes are picked up via
 * fs.watch.
 */
export class JsonSettingsStore implements SettingsStore {
  private readonly filePath: string;
  private readonly schema: SettingsSchema;
  private unknownKeys: Record<string, unknown> = {};
  private lastWriteTs = 0;
  private static readonly DEBOUNCE_MS = 200;

  constructor(filePath: string, schema: SettingsSchema) {
    this.filePath = filePath;
    this.schema = schema;
  }

  get path(): string {
    return this.filePath;
  }

  // ── SettingsStore interface ───────────────────────────────────────────

  async load(): Promise<Record<string, unknown>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        return {};
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      console.warn(`[settings] Corrupted JSON in ${this.filePath}, using defaults.`);
      return {};
    }
    if (!isRecord(parsed)) {
      console.warn(`[settings] ${this.filePath} does not hold an object, using defaults.`);
      return {};
    }

    // Separate known vs unknown keys.
    const known: Record<string, unknown> = {};
    this.unknownKeys = {};

    for (const [k, v] of Object.entries(parsed)) {
      if (k in this.schema) {
        known[k] = v;
      } else {
        this.unknownKeys[k] = v;
      }
    }

    return known;
  }

  async save(values: Record<string, unknown>): Promise<void> {
    const merged: Record<string, unknown> = { ...values, ...this.unknownKeys };
    const json = JSON.stringify(merged, null, 2) + "\n";

    // Atomic write: temp then rename.
    const dir = dirname(this.filePath);
    await mkdir(dir, { recursive: true });
    const tmp = join(dir, `.settings.tmp.${process.pid}.${Date.now()}`);
    await writeFile(tmp, json, "utf-8");
    await rename(tmp, this.filePath);
    this.lastWriteTs = Date.now();
  }

  watch(callback: () => void): () => void {
    let debounceTimer: ReturnType<typeof setTimeout> | null = null;
    let watcher: FSWatcher;

    try {
      watcher = fsWatch(this.filePath, () => {
        // Ignore events triggered by our own writes.
        if (Date.now() - this.lastWriteTs < JsonSettingsStore.DEBOUNCE_MS) {
          return;
        }
        if (debounceTimer) clearTimeout(debounceTimer);
        debounceTimer = setTimeout(callback, JsonSettingsStore.DEBOUNCE_MS);
      });
    } catch (err) {
      console.info(`[settings] Not watching ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
      return () => undefined;
    }
    watcher.unref();

    return () => {
      if (debounceTimer) clearTimeout(debounceTimer);
      watcher.close();
    };
  }

  // ── Unknown key helpers ───────────────────────────────────────────────

  /** Return keys present in the file but absent from the schema. */
  getUnknownKeys(): string[] {
    return Object.keys(this.unknownKeys);
  }
}
