/**
 * Settings Module - Pure Transformations
 */
import { type Result, err, ok } from "neverthrow";
import { parseNumber } from "../shared/parse.js";
import { type SettingsError, invalidField, noFields } from "./errors.js";
import type { Settings, SettingsKey } from "./schema.js";
import { DEFAULT_SETTINGS, SETTINGS_KEYS } from "./schema.js";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Negative values are clamped to zero.
 */
export const clampNonNegative = (value: number): number => Math.max(0, value);

/**
 * Read settings from a parsed settings file.
 *
 * Each field is read independently: unreadable values fall back to that
 * field's default, negative values clamp to 0. Anything that is not a JSON
 * object yields the defaults.
 */
export function parseStoredSettings(
  raw: unknown,
  defaults: Settings = DEFAULT_SETTINGS,
): Settings {
  if (!isRecord(raw)) {
    return { ...defaults };
  }

  const read = (key: SettingsKey): number => {
    const value = parseNumber(raw[key]);
    return value === null ? defaults[key] : clampNonNegative(value);
  };

  return {
    thresholdCm: read("thresholdCm"),
    emptyThresholdCm: read("emptyThresholdCm"),
    alertSustainSec: read("alertSustainSec"),
  };
}

/**
 * Apply a partial update from the settings API.
 *
 * Every supplied field must parse as a number; the update is rejected as a
 * whole otherwise. At least one field is required.
 */
export function applySettingsUpdate(
  current: Settings,
  raw: unknown,
): Result<Settings, SettingsError> {
  if (!isRecord(raw)) {
    return err(noFields());
  }

  const next: Settings = { ...current };
  let updated = false;

  for (const key of SETTINGS_KEYS) {
    if (!(key in raw)) {
      continue;
    }
    const value = parseNumber(raw[key]);
    if (value === null) {
      return err(invalidField(key));
    }
    next[key] = clampNonNegative(value);
    updated = true;
  }

  return updated ? ok(next) : err(noFields());
}
