/**
 * HTTP routes for the bin telemetry service.
 *
 * - /api/sensor-data - device uploads (bearer token)
 * - /api/command - dashboard commands (basic auth) and device polling
 * - /api/history, /api/history-page, /api/devices - stored readings
 * - /api/settings - alert thresholds
 * - /api/device-data, /api/alerts, /health - live state
 * - /, /history, /partials/* - server-rendered dashboard (basic auth)
 */
import { type Context, Hono } from "hono";
import { basicAuth } from "hono/basic-auth";

import type { AlertTracker } from "../alerts/index.js";
import type { CommandQueue } from "../commands/index.js";
import { CommandPollQuerySchema, normalizeCommandRequest } from "../commands/index.js";
import type { DeviceRegistry } from "../devices/index.js";
import { SensorPayloadSchema } from "../devices/index.js";
import type { HistoryService } from "../history/index.js";
import { PageQuerySchema, SeriesQuerySchema } from "../history/index.js";
import type { IngestionService } from "../ingestion/index.js";
import { createLogger } from "../logger.js";
import type { SettingsStore } from "../settings/index.js";
import { DeviceStatus } from "../ui/components/DeviceStatus.js";
import { Dashboard } from "../ui/pages/Dashboard.js";
import { History } from "../ui/pages/History.js";
import { deviceAuth } from "./middleware/deviceAuth.js";

const log = createLogger("api");

export type RouteServices = Readonly<{
  appName: string;
  auth: Readonly<{ username: string; password: string }>;
  settings: SettingsStore;
  registry: DeviceRegistry;
  commands: CommandQueue;
  alerts: AlertTracker;
  history: HistoryService;
  ingestion: IngestionService;
}>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Parse a JSON body; anything unparsable reads as null.
 */
async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch (error) {
    log.debug(
      {
        requestId: c.get("requestId"),
        error: error instanceof Error ? error.message : String(error),
      },
      "Request body is not JSON",
    );
    return null;
  }
}

export function createRoutes(services: RouteServices): Hono {
  const { settings, registry, commands, alerts, history, ingestion } = services;
  const routes = new Hono();
  const dashboardAuth = basicAuth({
    username: services.auth.username,
    password: services.auth.password,
  });

  // ===========================================================================
  // Device Uploads
  // ===========================================================================

  routes.post("/api/sensor-data", deviceAuth(services.auth.password), async (c) => {
    const requestId = c.get("requestId");
    const body = await readJson(c);

    if (!isRecord(body) || Object.keys(body).length === 0) {
      return c.json({ error: "No data provided" }, 400);
    }

    const payload = SensorPayloadSchema.safeParse(body);
    if (!payload.success) {
      return c.json({ error: "No data provided" }, 400);
    }

    const outcome = await ingestion.ingest(payload.data);
    log.debug(
      { requestId, deviceId: outcome.receipt.deviceId, fillStatus: outcome.row.fillStatus },
      "POST /api/sensor-data",
    );
    return c.json(outcome.receipt);
  });

  // ===========================================================================
  // Commands
  // ===========================================================================

  routes.post("/api/command", dashboardAuth, async (c) => {
    const requestId = c.get("requestId");
    const result = normalizeCommandRequest(await readJson(c));

    if (result.isErr()) {
      log.warn({ requestId, error: result.error.message }, "Command rejected");
      return c.json({ error: result.error.message }, 400);
    }

    const { deviceId, payload } = result.value;
    const command = commands.enqueue(deviceId, payload);
    return c.json({ status: "ok", ...command });
  });

  /**
   * Device polling. Answers {} when there is nothing newer than lastId.
   */
  routes.get("/api/command", (c) => {
    const query = CommandPollQuerySchema.parse(c.req.query());
    const deviceId = query.deviceId ?? registry.deviceIds()[0];
    if (deviceId === undefined) {
      return c.json({});
    }

    return c.json(commands.pending(deviceId, query.lastId) ?? {});
  });

  // ===========================================================================
  // History
  // ===========================================================================

  routes.get("/api/history", async (c) => {
    const query = SeriesQuerySchema.parse(c.req.query());
    const deviceId = await history.pickDeviceId(query.deviceId);
    if (deviceId === null) {
      return c.json({});
    }

    const series = await history.series(deviceId, query.limit);
    return c.json(series ?? {});
  });

  routes.get("/api/history-page", async (c) => {
    const query = PageQuerySchema.parse(c.req.query());
    const deviceId = await history.pickDeviceId(query.deviceId);
    return c.json(await history.page(deviceId, query.page, query.pageSize));
  });

  routes.get("/api/devices", async (c) => {
    return c.json({ deviceIds: await history.deviceIds() });
  });

  // ===========================================================================
  // Settings
  // ===========================================================================

  routes.get("/api/settings", (c) => c.json(settings.get()));

  routes.post("/api/settings", async (c) => {
    const updated = settings.update(await readJson(c));
    if (updated.isErr()) {
      return c.json({ error: updated.error.message }, 400);
    }

    // Best effort: the update is already live in memory
    const saved = await settings.save();
    if (saved.isErr()) {
      log.warn(
        { requestId: c.get("requestId"), error: saved.error.message },
        "Settings not persisted",
      );
    }

    return c.json({ status: "ok", ...updated.value });
  });

  // ===========================================================================
  // Live State
  // ===========================================================================

  routes.get("/api/device-data", (c) => c.json(registry.snapshots()));

  routes.get("/api/alerts", (c) => c.json(Object.fromEntries(alerts.snapshot())));

  routes.get("/health", (c) =>
    c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      devices_connected: registry.count(),
    }),
  );

  // ===========================================================================
  // Dashboard UI
  // ===========================================================================

  routes.get("/", dashboardAuth, (c) =>
    c.html(
      <Dashboard
        appName={services.appName}
        devices={registry.snapshots()}
        settings={settings.get()}
      />,
    ),
  );

  routes.get("/partials/devices", dashboardAuth, (c) =>
    c.html(<DeviceStatus devices={registry.snapshots()} />),
  );

  routes.get("/history", dashboardAuth, async (c) => {
    const query = PageQuerySchema.parse(c.req.query());
    const deviceId = await history.pickDeviceId(query.deviceId);
    const [page, deviceIds] = await Promise.all([
      history.page(deviceId, query.page, query.pageSize),
      history.deviceIds(),
    ]);

    return c.html(<History appName={services.appName} deviceIds={deviceIds} page={page} />);
  });

  return routes;
}
