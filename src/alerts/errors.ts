/**
 * Alerts Module - Error Types
 */

export type AlertError = {
  readonly type: "INVALID_DISTANCE";
  readonly message: string;
  readonly value: unknown;
};

export const invalidDistance = (value: unknown): AlertError => ({
  type: "INVALID_DISTANCE",
  message: "Distance is not a number",
  value,
});
