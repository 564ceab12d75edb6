import { getAllDefaults, validateValue } from "./schema.js";
import type { SettingChangeEvent, SettingsSchema, SettingsStore } from "./types.js";

type ChangeListener = (event: SettingChangeEvent) => void;

/**
 * Settings with validation, change detection, hot-reload propagation and
 * restart-required tracking. Invalid persisted values fall back to defaults.
 */
export class SettingsManager {
  private readonly schema: SettingsSchema;
  private readonly store: SettingsStore;

  private cache: Record<string, unknown> = {};
  private listeners: Set<ChangeListener> = new Set();
  private changedRestartKeys: Set<string> = new Set();
  private unwatch: (() => void) | undefined;

  constructor(schema: SettingsSchema, store: SettingsStore) {
    this.schema = schema;
    this.store = store;
  }

  /** Load persisted values, fill missing keys from defaults, wire file watch. */
  async init(options: { watch?: boolean } = {}): Promise<void> {
    this.cache = this.mergeWithDefaults(await this.store.load());

    if (options.watch ?? true) {
      this.unwatch = this.store.watch(() => {
        this.handleExternalChange().catch((err: unknown) => {
          console.warn("[settings] Reload after external edit failed:", err);
        });
      });
    }
  }

  /** Get a single setting value from in-memory cache. */
  get(key: string): unknown {
    if (key in this.cache) {
      return this.cache[key];
    }
    return this.schema[key]?.default;
  }

  /** Set a setting value. Validates, persists, emits events. */
  async set(key: string, value: unknown): Promise<SettingChangeEvent> {
    const def = this.schema[key];

    if (def) {
      const result = validateValue(key, value);
      if (!result.valid) {
        throw new Error(result.reason ?? `Invalid value for ${key}`);
      }
    }

    const oldValue: unknown = this.cache[key];
    this.cache[key] = value;
    await this.store.save(this.cache);

    const event: SettingChangeEvent = {
      key,
      oldValue,
      newValue: value,
      reloadPolicy: def?.reloadPolicy ?? "hot",
    };

    this.emitChange(event);
    return event;
  }

  /** Return full settings snapshot (known keys only). */
  getAll(): Record<string, unknown> {
    return { ...this.cache };
  }

  /** Reset a key to its schema default. */
  async reset(key: string): Promise<SettingChangeEvent> {
    return this.set(key, this.schema[key]?.default);
  }

  /** Subscribe to all setting changes. Returns unsubscribe function. */
  onSettingChanged(callback: ChangeListener): () => void {
    this.listeners.add(callback);
    return () => {
      this.listeners.delete(callback);
    };
  }

  /** True if any restart-required setting has changed since startup. */
  isRestartRequired(): boolean {
    return this.changedRestartKeys.size > 0;
  }

  /** List keys of changed restart-required settings. */
  getChangedRestartSettings(): string[] {
    return [...this.changedRestartKeys];
  }

  /** Tear down file watcher. */
  dispose(): void {
    this.unwatch?.();
    this.unwatch = undefined;
  }

  // ── Private helpers ───────────────────────────────────────────────────

  private mergeWithDefaults(persisted: Record<string, unknown>): Record<string, unknown> {
    const merged = getAllDefaults();
    for (const [key, value] of Object.entries(persisted)) {
      const result = validateValue(key, value);
      if (result.valid) {
        merged[key] = value;
      } else {
        console.warn(`[settings] Ignoring persisted ${result.reason ?? key}; using default.`);
      }
    }
    return merged;
  }

  private emitChange(event: SettingChangeEvent): void {
    if (this.schema[event.key]?.reloadPolicy === "restart") {
      this.changedRestartKeys.add(event.key);
      console.info(`[settings] ${event.key} changed; takes effect after restart.`);
    }

    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private async handleExternalChange(): Promise<void> {
    const merged = this.mergeWithDefaults(await this.store.load());

    for (const key of Object.keys(merged)) {
      const oldValue = this.cache[key];
      const newValue = merged[key];
      if (oldValue !== newValue) {
        this.cache[key] = newValue;
        this.emitChange({
          key,
          oldValue,
          newValue,
          reloadPolicy: this.schema[key]?.reloadPolicy ?? "hot",
        });
      }
    }
  }
}
