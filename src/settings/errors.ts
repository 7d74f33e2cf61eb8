/**
 * Settings Module - Error Types
 */
import type { SettingsKey } from "./schema.js";

export type SettingsError =
  | {
      readonly type: "INVALID_FIELD";
      readonly field: SettingsKey;
      readonly message: string;
    }
  | {
      readonly type: "NO_FIELDS";
      readonly message: string;
    }
  | {
      readonly type: "WRITE_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    };

export const invalidField = (field: SettingsKey): SettingsError => ({
  type: "INVALID_FIELD",
  field,
  message: `${field} must be a number`,
});

export const noFields = (): SettingsError => ({
  type: "NO_FIELDS",
  message: "No valid settings provided",
});

export const writeFailed = (
  path: string,
  message: string,
  cause?: Error,
): SettingsError =>
  cause !== undefined
    ? { type: "WRITE_FAILED", path, message, cause }
    : { type: "WRITE_FAILED", path, message };
