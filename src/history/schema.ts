/**
 * History Module - Schemas and Types
 *
 * Query parameters and response shapes for the dashboard's history views.
 */
import { z } from "zod";
import { deviceIdParam, intParam } from "../shared/query.js";
import type { ReadingRow } from "../storage/index.js";

export const DEFAULT_SERIES_LIMIT = 100;
export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 25;

export const SeriesQuerySchema = z.object({
  deviceId: deviceIdParam,
  limit: intParam(DEFAULT_SERIES_LIMIT),
});

export const PageQuerySchema = z.object({
  deviceId: deviceIdParam,
  page: intParam(DEFAULT_PAGE),
  pageSize: intParam(DEFAULT_PAGE_SIZE),
});

export type SeriesQuery = z.infer<typeof SeriesQuerySchema>;
export type PageQuery = z.infer<typeof PageQuerySchema>;

/**
 * Time series as parallel arrays, ready for a charting library.
 */
export type HistorySeries = Readonly<{
  deviceId: string;
  timestamps: ReadonlyArray<string>;
  distance: ReadonlyArray<number | null>;
  servo: ReadonlyArray<number | null>;
  motion: ReadonlyArray<0 | 1>;
  fillStatus: ReadonlyArray<string>;
}>;

/**
 * One page of the history table, newest first.
 */
export type HistoryPage = Readonly<{
  deviceId: string | null;
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
  rows: ReadonlyArray<ReadingRow>;
}>;
