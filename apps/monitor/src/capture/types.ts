/** Subsystems whose operations are timed. Closed set: add a tag here to extend it. */
export const COMPONENTS = [
  "editor",
  "extension",
  "assistant",
  "local_model",
  "terminal",
  "filesystem",
  "network",
  "system",
] as const;

export type Component = (typeof COMPONENTS)[number];

/** Component filter accepted by queries and sessions. */
export type ComponentScope = Component | "all";

const COMPONENT_SET: ReadonlySet<string> = new Set(COMPONENTS);

export function isComponent(value: unknown): value is Component {
  return typeof value === "string" && COMPONENT_SET.has(value);
}

/** Largest duration representable without precision loss; longer ones are clamped. */
export const MAX_DURATION_US = Number.MAX_SAFE_INTEGER;

/**
 * A captured measurement that has not been committed yet.
 * `wall_timestamp` is microseconds since the Unix epoch and is for ordering
 * and display only; `duration_us` always comes from the monotonic clock.
 */
export interface PendingEvent {
  readonly wall_timestamp: number;
  readonly component: Component;
  readonly source_label: string;
  readonly duration_us: number;
  readonly success: boolean;
  readonly metadata: Readonly<Record<string, string>>;
}

/** A durable measurement. `id` is assigned by the store on commit. */
export interface LatencyEvent extends PendingEvent {
  readonly id: number;
}
