import { serve } from "@hono/node-server";
import { DEFAULT_SETTINGS_PATH, SETTINGS_SCHEMA } from "./config/schema.js";
import { resolveMonitorConfig, resolveRetentionPolicy } from "./config/resolve.js";
import { SettingsManager } from "./config/settings.js";
import { JsonSettingsStore } from "./config/store.js";
import { describeError } from "./errors.js";
import { createMonitor } from "./index.js";

async function main(): Promise<void> {
  const settingsPath = process.env["LATENCY_MONITOR_SETTINGS"] ?? DEFAULT_SETTINGS_PATH;
  const settings = new SettingsManager(SETTINGS_SCHEMA, new JsonSettingsStore(settingsPath, SETTINGS_SCHEMA));
  await settings.init();

  const config = resolveMonitorConfig(settings.getAll());
  const monitor = createMonitor(config);
  monitor.startCollection();

  settings.onSettingChanged((event) => {
    if (!event.key.startsWith("retention.") || event.reloadPolicy !== "hot") {
      return;
    }
    try {
      monitor.retention.updatePolicy(resolveRetentionPolicy(settings.getAll()));
    } catch (err) {
      console.warn(`[settings] Retention change rejected: ${describeError(err)}`);
    }
  });

  const server = serve({ fetch: monitor.app.fetch, port: config.port }, (info) => {
    console.info(`[monitor] Query surface listening on http://localhost:${info.port}`);
  });

  let stopping = false;
  const stop = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.info(`[monitor] ${signal} received, draining`);
    settings.dispose();
    server.close();
    monitor
      .shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("[monitor] Shutdown failed:", err);
        process.exit(1);
      });
  };

  process.on("SIGINT", () => stop("SIGINT"));
  process.on("SIGTERM", () => stop("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("[monitor] Failed to start:", err);
  process.exit(1);
});
