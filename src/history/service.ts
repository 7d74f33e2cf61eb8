/**
 * History Module - Service Layer
 *
 * Answers history queries from the readings CSV and falls back to the
 * in-memory window when the CSV has nothing for the request.
 */
import type { DeviceRegistry } from "../devices/index.js";
import { createLogger } from "../logger.js";
import type { ReadingRow, ReadingStore } from "../storage/index.js";
import type { HistoryPage, HistorySeries } from "./schema.js";
import {
  filterByDevice,
  normalizeLimit,
  normalizePaging,
  pageNewestFirst,
  takeLast,
  toSeries,
  totalPages,
  uniqueDeviceIds,
} from "./transform.js";

const log = createLogger("history");

export type HistoryServiceDeps = Readonly<{
  store: ReadingStore;
  registry: DeviceRegistry;
}>;

export type HistoryService = Readonly<{
  /** Requested id, else the first live device, else the CSV's last device */
  pickDeviceId: (requested: string | null) => Promise<string | null>;
  /** Parallel-array series, null when there is no data */
  series: (deviceId: string, limit: number) => Promise<HistorySeries | null>;
  page: (deviceId: string | null, page: number, pageSize: number) => Promise<HistoryPage>;
  /** Live devices, else every device found in the CSV */
  deviceIds: () => Promise<ReadonlyArray<string>>;
}>;

export function createHistoryService(deps: HistoryServiceDeps): HistoryService {
  const { store, registry } = deps;

  const storedRows = async (): Promise<ReadonlyArray<ReadingRow>> => {
    const result = await store.rows();
    if (result.isErr()) {
      log.warn({ error: result.error.message }, "Reading history unavailable, using memory");
      return [];
    }
    return result.value;
  };

  const pickDeviceId = async (requested: string | null): Promise<string | null> => {
    if (requested) {
      return requested;
    }
    const live = registry.deviceIds()[0];
    if (live !== undefined) {
      return live;
    }
    const rows = await storedRows();
    const last = rows[rows.length - 1]?.deviceId;
    return last ? last : null;
  };

  const series = async (
    deviceId: string,
    limit: number,
  ): Promise<HistorySeries | null> => {
    const size = normalizeLimit(limit);
    const fromCsv = takeLast(filterByDevice(await storedRows(), deviceId), size);
    const rows = fromCsv.length > 0 ? fromCsv : takeLast(registry.history(deviceId), size);
    return rows.length > 0 ? toSeries(deviceId, rows) : null;
  };

  const page = async (
    deviceId: string | null,
    requestedPage: number,
    requestedPageSize: number,
  ): Promise<HistoryPage> => {
    const paging = normalizePaging(requestedPage, requestedPageSize);

    let rows = filterByDevice(await storedRows(), deviceId);
    if (rows.length === 0 && deviceId !== null) {
      rows = registry.history(deviceId);
    }

    return {
      deviceId,
      page: paging.page,
      pageSize: paging.pageSize,
      total: rows.length,
      totalPages: totalPages(rows.length, paging.pageSize),
      rows: pageNewestFirst(rows, paging.page, paging.pageSize),
    };
  };

  const deviceIds = async (): Promise<ReadonlyArray<string>> => {
    const live = registry.deviceIds();
    return live.length > 0 ? live : uniqueDeviceIds(await storedRows());
  };

  return { pickDeviceId, series, page, deviceIds };
}
