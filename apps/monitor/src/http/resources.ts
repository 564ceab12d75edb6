import { cpus, freemem, loadavg, totalmem, uptime } from "node:os";

/** Host resource figures. Passed through to clients as-is, never derived from events. */
export interface SystemResources {
  readonly cpu_count: number;
  readonly load_average: number[];
  readonly memory_total_bytes: number;
  readonly memory_free_bytes: number;
  readonly process_rss_bytes: number;
  readonly uptime_seconds: number;
}

export interface SystemResourceProvider {
  snapshot(): SystemResources | Promise<SystemResources>;
}

export const osResourceProvider: SystemResourceProvider = {
  snapshot: () => ({
    cpu_count: cpus().length,
    load_average: loadavg(),
    memory_total_bytes: totalmem(),
    memory_free_bytes: freemem(),
    process_rss_bytes: process.memoryUsage().rss,
    uptime_seconds: uptime(),
  }),
};
