/**
 * Storage Module - Public API
 */
export type { CsvField, CsvRecord, ReadingRow } from "./schema.js";
export { CSV_FIELDS, CsvRecordsSchema } from "./schema.js";

export type { StorageError } from "./errors.js";
export { invalidFormat, readFailed, writeFailed } from "./errors.js";

export type { ReadingStore } from "./service.js";
export { createCsvReadingStore } from "./service.js";

export type { CsvCell } from "./transform.js";
export { fromCsvRecord, toCsvRecord } from "./transform.js";
