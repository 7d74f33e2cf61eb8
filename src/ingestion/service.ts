/**
 * Ingestion Module - Service Layer
 *
 * One reading end to end: classify with the current settings, update the
 * registry, evaluate alerts, then persist. Alert and storage failures are
 * logged and never fail the request.
 */
import type { AlertEvaluation, AlertTracker } from "../alerts/index.js";
import type { DeviceRegistry, SensorPayload } from "../devices/index.js";
import { classifyWith, isFullFlag } from "../fill/index.js";
import { createLogger } from "../logger.js";
import type { SettingsStore } from "../settings/index.js";
import type { ReadingRow, ReadingStore } from "../storage/index.js";
import type { Classification } from "./transform.js";
import {
  readDistance,
  resolveDeviceId,
  toReadingRow,
  toSnapshot,
} from "./transform.js";

const log = createLogger("ingestion");

export type IngestionDeps = Readonly<{
  settings: Pick<SettingsStore, "get">;
  registry: Pick<DeviceRegistry, "record">;
  alerts: Pick<AlertTracker, "evaluate">;
  store: Pick<ReadingStore, "append">;
  clock?: () => number;
}>;

/**
 * Response body of POST /api/sensor-data.
 */
export type IngestReceipt = Readonly<{
  status: "ok";
  deviceId: string;
  serverTimestamp: string;
}>;

export type IngestOutcome = Readonly<{
  receipt: IngestReceipt;
  row: ReadingRow;
  /** Null when the distance could not be evaluated */
  alert: AlertEvaluation | null;
}>;

export type IngestionService = Readonly<{
  ingest: (payload: SensorPayload) => Promise<IngestOutcome>;
}>;

export function createIngestionService(deps: IngestionDeps): IngestionService {
  const clock = deps.clock ?? Date.now;

  const ingest = async (payload: SensorPayload): Promise<IngestOutcome> => {
    const now = clock();
    const serverTimestamp = new Date(now).toISOString();
    const deviceId = resolveDeviceId(payload);
    const settings = deps.settings.get();

    const distance = readDistance(payload);
    const classification: Classification = {
      distance,
      isFull: isFullFlag(distance, settings.thresholdCm),
      fillStatus: classifyWith(distance, settings),
    };

    const row = toReadingRow(deviceId, payload, serverTimestamp, classification);
    deps.registry.record(deviceId, toSnapshot(payload, serverTimestamp, classification), row);

    const evaluation = deps.alerts.evaluate(deviceId, payload.distance, settings, now);
    if (evaluation.isErr()) {
      log.debug({ deviceId, error: evaluation.error.message }, "Alert evaluation skipped");
    }

    const stored = await deps.store.append(row);
    if (stored.isErr()) {
      log.warn({ deviceId, error: stored.error.message }, "Reading not persisted");
    }

    log.debug(
      { deviceId, distance, fillStatus: classification.fillStatus },
      "Reading ingested",
    );

    return {
      receipt: { status: "ok", deviceId, serverTimestamp },
      row,
      alert: evaluation.isOk() ? evaluation.value : null,
    };
  };

  return { ingest };
}
