/**
 * Commands Module - Error Types
 *
 * Errors are values, not exceptions.
 */

export type CommandError =
  | {
      readonly type: "DEVICE_ID_REQUIRED";
      readonly message: string;
    }
  | {
      readonly type: "INVALID_TARGET_POSITION";
      readonly message: string;
      readonly value: unknown;
    };

export function deviceIdRequired(): CommandError {
  return { type: "DEVICE_ID_REQUIRED", message: "deviceId required" };
}

export function invalidTargetPosition(value: unknown): CommandError {
  return {
    type: "INVALID_TARGET_POSITION",
    message: "targetPosition required/int for setAngle",
    value,
  };
}
