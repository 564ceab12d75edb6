/**
 * Error taxonomy for the latency pipeline.
 *
 * Failures inside the pipeline are contained and surfaced as counters plus a
 * frozen {@link MonitorFault} record; only storage initialization and query
 * validation errors reach the caller as thrown {@link MonitorError}s.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Exhaustive set of monitor error codes. */
export type MonitorErrorCode =
  | "CAPTURE_FAILURE"
  | "BUFFER_OVERFLOW"
  | "COMMIT_FAILURE"
  | "RETENTION_FAILURE"
  | "QUERY_FAILURE"
  | "STORAGE_INIT_FAILURE"
  | "INVALID_SESSION_TRANSITION"
  | "WRITE_HANDLE_OWNED";

/** Structured record of the most recent failure of a kind. */
export interface MonitorFault {
  readonly code: MonitorErrorCode;
  readonly message: string;
  readonly at: string;
}

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class MonitorError extends Error {
  constructor(
    public readonly code: MonitorErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MonitorError";
  }
}

/** Malformed window, component filter or limit. No partial result is returned. */
export class QueryError extends MonitorError {
  constructor(message: string) {
    super("QUERY_FAILURE", message);
    this.name = "QueryError";
  }
}

/** The store could not be created or opened at all. Fatal at startup. */
export class StorageInitError extends MonitorError {
  constructor(path: string, cause: unknown) {
    super("STORAGE_INIT_FAILURE", `Cannot open latency store at ${path}: ${describeError(cause)}`, {
      cause,
    });
    this.name = "StorageInitError";
  }
}

export class CommitError extends MonitorError {
  constructor(batchId: string, attempts: number, cause: unknown) {
    super(
      "COMMIT_FAILURE",
      `Batch ${batchId} failed after ${attempts} attempt(s): ${describeError(cause)}`,
      { cause },
    );
    this.name = "CommitError";
  }
}

export class WriteHandleOwnedError extends MonitorError {
  constructor() {
    super("WRITE_HANDLE_OWNED", "The latency store write handle is already owned by a writer");
    this.name = "WriteHandleOwnedError";
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function describeError(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function fault(code: MonitorErrorCode, cause: unknown, now: Date = new Date()): MonitorFault {
  return Object.freeze({ code, message: describeError(cause), at: now.toISOString() });
}
