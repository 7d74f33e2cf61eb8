/**
 * Ingestion Module - Public API
 */
export type {
  IngestionDeps,
  IngestionService,
  IngestOutcome,
  IngestReceipt,
} from "./service.js";
export { createIngestionService } from "./service.js";

export type { Classification } from "./transform.js";
export {
  UNKNOWN_DEVICE_ID,
  readDistance,
  resolveDeviceId,
  toReadingRow,
  toSnapshot,
} from "./transform.js";
