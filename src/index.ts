/**
 * Smart Bin Telemetry - Application Entry Point
 *
 * Loads settings, builds the services, and serves the Hono app on Node.
 */
import "dotenv/config";
import { serve } from "@hono/node-server";

import { createAlertTracker } from "./alerts/index.js";
import { createApp } from "./app.js";
import { createCommandQueue } from "./commands/index.js";
import {
  config,
  getAuthConfig,
  getNotificationConfig,
  getStorageConfig,
} from "./config.js";
import { createDeviceRegistry } from "./devices/index.js";
import { createHistoryService } from "./history/index.js";
import { createIngestionService } from "./ingestion/index.js";
import { createLogger } from "./logger.js";
import { createWebhookNotifier } from "./notifications/index.js";
import { createSettingsStore } from "./settings/index.js";
import { createCsvReadingStore } from "./storage/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log(`  ${config.APP_NAME.toUpperCase()} TELEMETRY`);
console.log("========================================");
console.log("");

const storage = getStorageConfig();
const notificationConfig = getNotificationConfig();

log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    dataDir: storage.dataDir,
    maxHistoryInMemory: storage.maxHistoryInMemory,
  },
  "Configuration loaded",
);

if (notificationConfig) {
  log.info({ timeoutMs: notificationConfig.timeoutMs }, "Webhook notifications: ENABLED");
} else {
  log.info("Webhook notifications: DISABLED");
}

// =============================================================================
// SERVICES
// =============================================================================

const settings = createSettingsStore(storage.settingsPath);
const loaded = await settings.load();
log.info(loaded, "Settings loaded");

const store = createCsvReadingStore(storage.csvPath);
const registry = createDeviceRegistry(storage.maxHistoryInMemory);
const commands = createCommandQueue();
const alerts = createAlertTracker({
  commands,
  notify: createWebhookNotifier(notificationConfig),
});

const app = createApp({
  appName: config.APP_NAME,
  auth: getAuthConfig(),
  settings,
  registry,
  commands,
  alerts,
  history: createHistoryService({ store, registry }),
  ingestion: createIngestionService({ settings, registry, alerts, store }),
});

// =============================================================================
// START SERVER
// =============================================================================

const server = serve(
  { fetch: app.fetch, port: config.PORT, hostname: config.HOST },
  (info) => {
    log.info(
      { port: info.port, host: config.HOST, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  server.close((error) => {
    if (error) {
      log.error({ error: error.message }, "Server did not close cleanly");
      process.exit(1);
    }
    log.info("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
