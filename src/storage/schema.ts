/**
 * Storage Module - Schemas and Types
 *
 * Column layout of the append-only readings CSV and the typed row it maps to.
 */
import { z } from "zod";

export const CSV_FIELDS = [
  "serverTimestamp",
  "deviceId",
  "deviceTimestamp",
  "deviceUptimeMs",
  "distance",
  "motion",
  "servoPosition",
  "targetPosition",
  "shouldActivateServo",
  "isFull",
  "fillStatus",
] as const;

export type CsvField = (typeof CSV_FIELDS)[number];

/**
 * Raw CSV records as read back from disk: header name → cell text.
 */
export const CsvRecordsSchema = z.array(z.record(z.string(), z.string()));

export type CsvRecord = Readonly<Record<string, string>>;

/**
 * One classified reading, as persisted and as served by the history API.
 */
export type ReadingRow = Readonly<{
  serverTimestamp: string;
  deviceId: string;
  /** Device clock, passed through as sent */
  deviceTimestamp: string | number | null;
  deviceUptimeMs: number | null;
  distance: number | null;
  motion: 0 | 1;
  servoPosition: number | null;
  targetPosition: number | null;
  shouldActivateServo: 0 | 1;
  isFull: 0 | 1;
  fillStatus: string;
}>;
