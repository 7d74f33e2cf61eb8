/**
 * Settings Module - Service Layer
 *
 * Holds the process-wide settings behind an accessor. Reads hand out copies,
 * so a caller cannot mutate what other requests see.
 */
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { type Result, err, ok } from "neverthrow";

import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import { type SettingsError, writeFailed } from "./errors.js";
import type { Settings } from "./schema.js";
import { DEFAULT_SETTINGS } from "./schema.js";
import { applySettingsUpdate, parseStoredSettings } from "./transform.js";

const log = createLogger("settings");

export type SettingsStore = Readonly<{
  /** Read the settings file, falling back to defaults. Never fails. */
  load: () => Promise<Settings>;
  /** Copy of the current settings */
  get: () => Settings;
  /** Validate and apply a partial update in memory */
  update: (raw: unknown) => Result<Settings, SettingsError>;
  /** Write the current settings to disk */
  save: () => Promise<Result<void, SettingsError>>;
}>;

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Create a settings store backed by a JSON file.
 *
 * @param settingsPath - Location of settings.json
 * @param initial - Settings in effect before load() runs
 */
export function createSettingsStore(
  settingsPath: string,
  initial: Settings = DEFAULT_SETTINGS,
): SettingsStore {
  let current: Settings = { ...initial };

  const load = async (): Promise<Settings> => {
    let text: string;
    try {
      text = await readFile(settingsPath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        log.info({ path: settingsPath }, "No settings file, using defaults");
      } else {
        log.warn(
          { path: settingsPath, error: error instanceof Error ? error.message : String(error) },
          "Settings file unreadable, using defaults",
        );
      }
      current = { ...DEFAULT_SETTINGS };
      return { ...current };
    }

    try {
      current = parseStoredSettings(JSON.parse(text));
      log.info({ path: settingsPath, settings: current }, "Settings loaded");
    } catch (error) {
      log.warn(
        { path: settingsPath, error: error instanceof Error ? error.message : String(error) },
        "Settings file corrupt, using defaults",
      );
      current = { ...DEFAULT_SETTINGS };
    }
    return { ...current };
  };

  const get = (): Settings => ({ ...current });

  const update = (raw: unknown): Result<Settings, SettingsError> => {
    const result = applySettingsUpdate(current, raw);
    if (result.isErr()) {
      log.warn({ error: result.error }, "Settings update rejected");
      return result;
    }
    current = result.value;
    log.info({ settings: current }, "Settings updated");
    return ok({ ...current });
  };

  const save = async (): Promise<Result<void, SettingsError>> => {
    const startTime = Date.now();
    logOperationStart(log, "saveSettings", { path: settingsPath });
    try {
      await mkdir(path.dirname(settingsPath), { recursive: true });
      await writeFile(settingsPath, JSON.stringify(current), "utf-8");
      logOperationComplete(log, "saveSettings", startTime);
      return ok(undefined);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logOperationFailed(log, "saveSettings", cause, { path: settingsPath });
      return err(writeFailed(settingsPath, cause.message, cause));
    }
  };

  return { load, get, update, save };
}
