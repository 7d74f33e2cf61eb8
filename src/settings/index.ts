/**
 * Settings Module - Public API
 */
export type { Settings, SettingsKey } from "./schema.js";
export { DEFAULT_SETTINGS, SETTINGS_KEYS, SettingsSchema } from "./schema.js";

export type { SettingsError } from "./errors.js";
export { invalidField, noFields, writeFailed } from "./errors.js";

export type { SettingsStore } from "./service.js";
export { createSettingsStore } from "./service.js";

export {
  applySettingsUpdate,
  clampNonNegative,
  parseStoredSettings,
} from "./transform.js";
