/**
 * Devices Module - Service Layer
 *
 * In-memory view of the fleet: the latest payload from each device and a
 * bounded window of its recent readings. Devices are listed in the order
 * they first reported.
 */
import { createLogger } from "../logger.js";
import type { ReadingRow } from "../storage/index.js";
import type { DeviceSnapshot } from "./schema.js";
import { DEFAULT_MAX_HISTORY } from "./schema.js";

const log = createLogger("devices");

export type DeviceRegistry = Readonly<{
  /** Store the latest payload and push a history row */
  record: (deviceId: string, snapshot: DeviceSnapshot, row: ReadingRow) => void;
  /** Latest payload per device */
  snapshots: () => Readonly<Record<string, DeviceSnapshot>>;
  /** Device ids in first-seen order */
  deviceIds: () => ReadonlyArray<string>;
  /** Most recent history rows for a device, oldest first */
  history: (deviceId: string) => ReadonlyArray<ReadingRow>;
  count: () => number;
}>;

/**
 * Create a device registry.
 *
 * @param maxHistory - Rows kept per device; older rows are discarded
 */
export function createDeviceRegistry(
  maxHistory: number = DEFAULT_MAX_HISTORY,
): DeviceRegistry {
  const latest = new Map<string, DeviceSnapshot>();
  const histories = new Map<string, ReadingRow[]>();

  const record = (
    deviceId: string,
    snapshot: DeviceSnapshot,
    row: ReadingRow,
  ): void => {
    if (!latest.has(deviceId)) {
      log.info({ deviceId }, "New device reporting");
    }
    latest.set(deviceId, snapshot);

    const rows = histories.get(deviceId) ?? [];
    rows.push(row);
    if (rows.length > maxHistory) {
      rows.splice(0, rows.length - maxHistory);
    }
    histories.set(deviceId, rows);
  };

  const snapshots = (): Readonly<Record<string, DeviceSnapshot>> =>
    Object.fromEntries(latest);

  const deviceIds = (): ReadonlyArray<string> => [...latest.keys()];

  const history = (deviceId: string): ReadonlyArray<ReadingRow> => [
    ...(histories.get(deviceId) ?? []),
  ];

  const count = (): number => latest.size;

  return { record, snapshots, deviceIds, history, count };
}
