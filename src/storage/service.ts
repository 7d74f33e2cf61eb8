/**
 * Storage Module - Service Layer
 *
 * Append-only CSV log of classified readings. Appends are chained so the
 * header is written exactly once even when requests overlap.
 */
import { appendFile, mkdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  type StorageError,
  invalidFormat,
  readFailed,
  writeFailed,
} from "./errors.js";
import type { ReadingRow } from "./schema.js";
import { CSV_FIELDS, CsvRecordsSchema } from "./schema.js";
import { fromCsvRecord, toCsvRecord } from "./transform.js";

const log = createLogger("storage");

export type ReadingStore = Readonly<{
  /** Append one reading */
  append: (row: ReadingRow) => Promise<Result<void, StorageError>>;
  /** All stored readings in file order; empty when the file does not exist */
  rows: () => Promise<Result<ReadonlyArray<ReadingRow>, StorageError>>;
}>;

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Create a CSV-backed reading store.
 *
 * @param csvPath - Location of the readings CSV
 */
export function createCsvReadingStore(csvPath: string): ReadingStore {
  let headerWritten: boolean | null = null;
  let tail: Promise<unknown> = Promise.resolve();

  const hasContent = async (): Promise<boolean> => {
    try {
      const info = await stat(csvPath);
      return info.size > 0;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  };

  const write = async (row: ReadingRow): Promise<Result<void, StorageError>> => {
    try {
      if (headerWritten === null) {
        await mkdir(path.dirname(csvPath), { recursive: true });
        headerWritten = await hasContent();
      }

      const line = stringify([toCsvRecord(row)], {
        header: !headerWritten,
        columns: [...CSV_FIELDS],
      });
      await appendFile(csvPath, line, "utf-8");
      headerWritten = true;

      log.trace({ deviceId: row.deviceId }, "Reading appended");
      return ok(undefined);
    } catch (error) {
      const cause = toError(error);
      log.error({ path: csvPath, error: cause.message }, "Failed to append reading");
      return err(writeFailed(csvPath, cause));
    }
  };

  const append = (row: ReadingRow): Promise<Result<void, StorageError>> => {
    const next = tail.then(() => write(row));
    tail = next;
    return next;
  };

  const rows = async (): Promise<
    Result<ReadonlyArray<ReadingRow>, StorageError>
  > => {
    let text: string;
    try {
      text = await readFile(csvPath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return ok([]);
      }
      const cause = toError(error);
      log.warn({ path: csvPath, error: cause.message }, "Failed to read readings");
      return err(readFailed(csvPath, cause));
    }

    let records: unknown;
    try {
      records = parse(text, {
        columns: true,
        skip_empty_lines: true,
        relax_column_count: true,
        bom: true,
      });
    } catch (error) {
      const cause = toError(error);
      log.warn({ path: csvPath, error: cause.message }, "Readings CSV is malformed");
      return err(invalidFormat(csvPath, cause.message));
    }

    const parsed = CsvRecordsSchema.safeParse(records);
    if (!parsed.success) {
      return err(invalidFormat(csvPath, parsed.error.message));
    }
    return ok(parsed.data.map(fromCsvRecord));
  };

  return { append, rows };
}
