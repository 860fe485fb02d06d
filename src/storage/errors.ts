/**
 * Storage Module - Error Types
 */

export type StorageError =
  | {
      readonly type: "WRITE_FAILED";
      readonly filePath: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "CORRUPT_FILE";
      readonly filePath: string;
      readonly message: string;
    };

export function writeFailed(
  filePath: string,
  message: string,
  cause?: Error,
): StorageError {
  if (cause) {
    return { type: "WRITE_FAILED", filePath, message, cause };
  }
  return { type: "WRITE_FAILED", filePath, message };
}

export function corruptFile(filePath: string, message: string): StorageError {
  return { type: "CORRUPT_FILE", filePath, message };
}

/**
 * Format a StorageError for logging.
 */
export function formatStorageError(error: StorageError): string {
  switch (error.type) {
    case "WRITE_FAILED":
      return `Failed to write ${error.filePath}: ${error.message}`;
    case "CORRUPT_FILE":
      return `Ignoring unreadable ${error.filePath}: ${error.message}`;
  }
}
