/**
 * Storage Module - Pure Transformations
 *
 * Conversions between typed reading rows and CSV records.
 */
import { parseFlag, parseInteger, parseNumber } from "../shared/parse.js";
import type { CsvField, CsvRecord, ReadingRow } from "./schema.js";

export type CsvCell = string | number | null;

/**
 * Flatten a reading row into CSV cells, in column order.
 */
export function toCsvRecord(row: ReadingRow): Record<CsvField, CsvCell> {
  return {
    serverTimestamp: row.serverTimestamp,
    deviceId: row.deviceId,
    deviceTimestamp: row.deviceTimestamp,
    deviceUptimeMs: row.deviceUptimeMs,
    distance: row.distance,
    motion: row.motion,
    servoPosition: row.servoPosition,
    targetPosition: row.targetPosition,
    shouldActivateServo: row.shouldActivateServo,
    isFull: row.isFull,
    fillStatus: row.fillStatus,
  };
}

const cell = (record: CsvRecord, field: CsvField): string | null => {
  const value = record[field];
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
};

/**
 * Read a CSV record back into a typed row. Missing or unreadable numeric
 * cells become null; rows written before the fillStatus column existed read
 * as "unknown".
 */
export function fromCsvRecord(record: CsvRecord): ReadingRow {
  return {
    serverTimestamp: cell(record, "serverTimestamp") ?? "",
    deviceId: cell(record, "deviceId") ?? "",
    deviceTimestamp: cell(record, "deviceTimestamp"),
    deviceUptimeMs: parseInteger(cell(record, "deviceUptimeMs")),
    distance: parseNumber(cell(record, "distance")),
    motion: parseFlag(cell(record, "motion")),
    servoPosition: parseInteger(cell(record, "servoPosition")),
    targetPosition: parseInteger(cell(record, "targetPosition")),
    shouldActivateServo: parseFlag(cell(record, "shouldActivateServo")),
    isFull: parseFlag(cell(record, "isFull")),
    fillStatus: cell(record, "fillStatus") ?? "unknown",
  };
}
