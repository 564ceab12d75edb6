import type { Context, Next } from "hono";

/** One line per request: method, path, status and duration. */
export function requestLogger() {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now();
    await next();
    const ms = (performance.now() - start).toFixed(1);
    console.info(`[http] ${c.req.method} ${c.req.path} ${c.res.status} ${ms}ms`);
  };
}
