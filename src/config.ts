/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Smart Bin Telemetry configuration covering:
 * - Server settings
 * - Data directory (readings CSV, settings file)
 * - Discord webhook notifications
 * - Dashboard / device authentication
 */
import path from "node:path";
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional URL - empty string becomes undefined
 */
const optionalUrl = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined))
  .pipe(z.string().url().optional());

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().int().positive().default(5000).describe("HTTP server port"),
  HOST: z.string().default("0.0.0.0").describe("Bind address"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("SmartBin").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Storage
  // ==========================================================================
  DATA_DIR: z
    .string()
    .default("./data")
    .describe("Directory holding sensor_data.csv and settings.json"),
  MAX_HISTORY_IN_MEMORY: z.coerce
    .number()
    .int()
    .positive()
    .default(500)
    .describe("Recent history points kept in memory per device"),

  // ==========================================================================
  // Discord Notifications
  // ==========================================================================
  DISCORD_WEBHOOK: optionalUrl.describe("Discord webhook URL for bin alerts"),
  NOTIFIER_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(10_000)
    .describe("HTTP timeout for webhook delivery (ms)"),
  ENABLE_NOTIFICATIONS: envBoolean(true).describe(
    "Enable webhook notifications",
  ),

  // ==========================================================================
  // Authentication
  // ==========================================================================
  SITE_AUTH_USER: z
    .string()
    .min(1)
    .default("trash")
    .describe("Dashboard basic-auth user"),
  SITE_AUTH_PASS: z
    .string()
    .min(1)
    .default("trash_123")
    .describe("Dashboard basic-auth password and device bearer token"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Webhook notification configuration.
 * Returns null if notifications are disabled or no webhook is configured.
 */
export function getNotificationConfig(): Readonly<{
  webhookUrl: string;
  timeoutMs: number;
}> | null {
  if (!config.ENABLE_NOTIFICATIONS || !config.DISCORD_WEBHOOK) {
    return null;
  }

  return {
    webhookUrl: config.DISCORD_WEBHOOK,
    timeoutMs: config.NOTIFIER_TIMEOUT_MS,
  };
}

/**
 * File locations for persisted readings and settings.
 */
export function getStorageConfig(): Readonly<{
  dataDir: string;
  csvPath: string;
  settingsPath: string;
  maxHistoryInMemory: number;
}> {
  const dataDir = path.resolve(config.DATA_DIR);
  return {
    dataDir,
    csvPath: path.join(dataDir, "sensor_data.csv"),
    settingsPath: path.join(dataDir, "settings.json"),
    maxHistoryInMemory: config.MAX_HISTORY_IN_MEMORY,
  };
}

/**
 * Credentials shared by dashboard basic auth and device bearer auth.
 */
export function getAuthConfig(): Readonly<{
  username: string;
  password: string;
}> {
  return {
    username: config.SITE_AUTH_USER,
    password: config.SITE_AUTH_PASS,
  };
}
