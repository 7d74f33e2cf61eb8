/**
 * History Module - Pure Transformations
 */
import type { ReadingRow } from "../storage/index.js";
import type { HistorySeries } from "./schema.js";
import {
  DEFAULT_PAGE,
  DEFAULT_PAGE_SIZE,
  DEFAULT_SERIES_LIMIT,
} from "./schema.js";

/**
 * Page numbers start at 1; non-positive page sizes use the default.
 */
export function normalizePaging(
  page: number,
  pageSize: number,
): { page: number; pageSize: number } {
  return {
    page: page > 0 ? page : DEFAULT_PAGE,
    pageSize: pageSize > 0 ? pageSize : DEFAULT_PAGE_SIZE,
  };
}

/**
 * Non-positive series limits use the default.
 */
export function normalizeLimit(limit: number): number {
  return limit > 0 ? limit : DEFAULT_SERIES_LIMIT;
}

export function totalPages(total: number, pageSize: number): number {
  return Math.ceil(total / pageSize);
}

/**
 * Rows belonging to a device; a null device id keeps every row.
 */
export function filterByDevice(
  rows: ReadonlyArray<ReadingRow>,
  deviceId: string | null,
): ReadonlyArray<ReadingRow> {
  return deviceId === null ? rows : rows.filter((row) => row.deviceId === deviceId);
}

/**
 * The last `limit` rows, oldest first.
 */
export function takeLast<T>(rows: ReadonlyArray<T>, limit: number): ReadonlyArray<T> {
  return rows.length > limit ? rows.slice(rows.length - limit) : rows;
}

/**
 * One page of rows, newest first.
 */
export function pageNewestFirst(
  rows: ReadonlyArray<ReadingRow>,
  page: number,
  pageSize: number,
): ReadonlyArray<ReadingRow> {
  const start = (page - 1) * pageSize;
  return [...rows].reverse().slice(start, start + pageSize);
}

/**
 * Unique non-blank device ids in first-seen order.
 */
export function uniqueDeviceIds(rows: ReadonlyArray<ReadingRow>): ReadonlyArray<string> {
  const seen = new Set<string>();
  for (const row of rows) {
    const deviceId = row.deviceId.trim();
    if (deviceId) {
      seen.add(deviceId);
    }
  }
  return [...seen];
}

/**
 * Convert rows into parallel arrays.
 */
export function toSeries(
  deviceId: string,
  rows: ReadonlyArray<ReadingRow>,
): HistorySeries {
  return {
    deviceId,
    timestamps: rows.map((row) => row.serverTimestamp),
    distance: rows.map((row) => row.distance),
    servo: rows.map((row) => row.servoPosition),
    motion: rows.map((row) => row.motion),
    fillStatus: rows.map((row) => row.fillStatus),
  };
}
