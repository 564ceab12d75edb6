/**
 * Read-only HTTP query surface.
 *
 * Every route is a GET over the query interface; nothing here writes to the
 * store. Invalid query parameters answer 400 with `{ error, code }`.
 *
 * @module
 */

import { generateId } from "@latency-monitor/ids";
import { Hono, type Context } from "hono";
import { z } from "zod";
import { MonitorError, QueryError } from "../errors.js";
import type { IngestionBuffer } from "../ingest/buffer.js";
import type { PipelineCounters } from "../ingest/counters.js";
import type { QueryInterface } from "../query/query.js";
import { DEFAULT_EVENT_LIMIT, MAX_EVENT_LIMIT } from "../query/window.js";
import type { SessionManager } from "../session/sessions.js";
import { requestLogger } from "./request_logger.js";
import { osResourceProvider, type SystemResourceProvider } from "./resources.js";

export interface AppDeps {
  query: QueryInterface;
  sessions: SessionManager;
  counters: PipelineCounters;
  buffer: IngestionBuffer;
  resources?: SystemResourceProvider;
}

const eventsQuery = z.object({
  limit: z.coerce.number().int().default(DEFAULT_EVENT_LIMIT),
  component: z.string().min(1).optional(),
});

const windowQuery = z.object({
  window: z.string().min(1).default("1h"),
  component: z.string().min(1).optional(),
});

const exportQuery = windowQuery.extend({
  limit: z.coerce.number().int().default(MAX_EVENT_LIMIT),
});

/** Validate `c.req.query()` against `schema`, throwing a QueryError on failure. */
function parseQuery<T extends z.ZodTypeAny>(c: Context, schema: T): z.infer<T> {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    const fields = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new QueryError(`Invalid query parameters (${fields})`);
  }
  return result.data;
}

export function createApp(deps: AppDeps): Hono {
  const { query, sessions, counters, buffer } = deps;
  const resources = deps.resources ?? osResourceProvider;
  const app = new Hono();

  app.onError((err, c) => {
    if (err instanceof MonitorError && err.code === "QUERY_FAILURE") {
      return c.json({ error: err.message, code: err.code }, 400);
    }
    console.error(`[http] ${c.req.method} ${c.req.path} failed:`, err);
    return c.json({ error: "Internal server error." }, 500);
  });

  app.notFound((c) => c.json({ error: "Not found." }, 404));

  app.use("*", requestLogger());

  app.get("/health", (c) => c.json({ status: "healthy", timestamp: new Date().toISOString() }));

  app.get("/api/events", (c) => {
    const { limit, component } = parseQuery(c, eventsQuery);
    const events = query.rawEvents(limit, component);
    return c.json({ events, total_count: query.totalCount() });
  });

  app.get("/api/metrics/summary", (c) => {
    const { window, component } = parseQuery(c, windowQuery);
    if (component !== undefined) {
      return c.json({ summary: query.summary(window, component) });
    }
    return c.json(query.summaryWithBreakdown(window));
  });

  app.get("/api/monitoring/status", (c) =>
    c.json({
      health: query.health(),
      last_event: query.lastEvent() ?? null,
      counters: query.counters(),
      buffer: { size: buffer.size, capacity: buffer.capacity, utilization: buffer.utilization },
      sessions: sessions.list(),
      last_faults: counters.lastFaults(),
    }),
  );

  app.get("/api/system/resources", async (c) => c.json(await resources.snapshot()));

  app.get("/api/export", (c) => {
    const { window, component, limit } = parseQuery(c, exportQuery);
    const { records, total_in_window } = query.exportEvents(window, component, limit);
    return c.json({
      export_id: generateId("export"),
      records,
      count: records.length,
      total_in_window,
      truncated: records.length < total_in_window,
    });
  });

  return app;
}
