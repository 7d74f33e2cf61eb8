/**
 * Storage Module - Error Types
 */

export type StorageError =
  | {
      readonly type: "READ_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "WRITE_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "INVALID_FORMAT";
      readonly path: string;
      readonly message: string;
    };

export function readFailed(path: string, cause: Error): StorageError {
  return { type: "READ_FAILED", path, message: cause.message, cause };
}

export function writeFailed(path: string, cause: Error): StorageError {
  return { type: "WRITE_FAILED", path, message: cause.message, cause };
}

export function invalidFormat(path: string, message: string): StorageError {
  return { type: "INVALID_FORMAT", path, message };
}
