/**
 * Ingestion Module - Pure Transformations
 *
 * Turns a raw sensor payload into the registry snapshot and the persisted
 * reading row.
 */
import type { DeviceSnapshot, SensorPayload } from "../devices/index.js";
import type { FillStatus } from "../fill/index.js";
import { parseInteger, parseNumber } from "../shared/parse.js";
import type { ReadingRow } from "../storage/index.js";

export const UNKNOWN_DEVICE_ID = "unknown";

/**
 * Device id as reported; falsy ids collapse to "unknown".
 */
export function resolveDeviceId(payload: SensorPayload): string {
  return payload.deviceId ? String(payload.deviceId) : UNKNOWN_DEVICE_ID;
}

export type Classification = Readonly<{
  distance: number | null;
  isFull: 0 | 1;
  fillStatus: FillStatus;
}>;

const truthyFlag = (value: unknown): 0 | 1 => (value ? 1 : 0);

const passthroughTimestamp = (value: unknown): string | number | null =>
  typeof value === "string" || typeof value === "number" ? value : null;

/**
 * Latest-payload view: the body as sent plus the server-side fields.
 */
export function toSnapshot(
  payload: SensorPayload,
  serverTimestamp: string,
  classification: Classification,
): DeviceSnapshot {
  return {
    ...payload,
    serverTimestamp,
    isFull: classification.isFull,
    fillStatus: classification.fillStatus,
  };
}

/**
 * Persisted reading row. Motion and servo activation are stored as 0/1 by
 * truthiness of the reported value.
 */
export function toReadingRow(
  deviceId: string,
  payload: SensorPayload,
  serverTimestamp: string,
  classification: Classification,
): ReadingRow {
  return {
    serverTimestamp,
    deviceId,
    deviceTimestamp: passthroughTimestamp(payload.deviceTimestamp),
    deviceUptimeMs: parseInteger(payload.deviceUptimeMs),
    distance: classification.distance,
    motion: truthyFlag(payload.motion),
    servoPosition: parseInteger(payload.servoPosition),
    targetPosition: parseInteger(payload.targetPosition),
    shouldActivateServo: truthyFlag(payload.shouldActivateServo),
    isFull: classification.isFull,
    fillStatus: classification.fillStatus,
  };
}

/**
 * Read the distance leniently; unreadable values classify as "unknown".
 */
export function readDistance(payload: SensorPayload): number | null {
  return parseNumber(payload.distance);
}
