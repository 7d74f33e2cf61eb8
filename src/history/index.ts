/**
 * History Module - Public API
 */
export type {
  HistoryPage,
  HistorySeries,
  PageQuery,
  SeriesQuery,
} from "./schema.js";
export {
  DEFAULT_PAGE,
  DEFAULT_PAGE_SIZE,
  DEFAULT_SERIES_LIMIT,
  PageQuerySchema,
  SeriesQuerySchema,
} from "./schema.js";

export type { HistoryService, HistoryServiceDeps } from "./service.js";
export { createHistoryService } from "./service.js";

export {
  filterByDevice,
  normalizeLimit,
  normalizePaging,
  pageNewestFirst,
  takeLast,
  toSeries,
  totalPages,
  uniqueDeviceIds,
} from "./transform.js";
