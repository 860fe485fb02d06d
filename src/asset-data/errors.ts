/**
 * Asset-Data Module - Error Types
 *
 * Typed error unions for remote asset-data operations.
 * Errors are values, not exceptions.
 */

export type AssetDataError =
  | {
      readonly type: "PUSH_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "RESOURCE_UNKNOWN";
      readonly path: string;
      readonly message: string;
    }
  | {
      readonly type: "RECORD_UNKNOWN";
      readonly recordId: number;
      readonly message: string;
    };

/**
 * Create a PUSH_FAILED error.
 */
export function pushFailed(
  path: string,
  message: string,
  cause?: Error,
): AssetDataError {
  if (cause) {
    return { type: "PUSH_FAILED", path, message, cause };
  }
  return { type: "PUSH_FAILED", path, message };
}

/**
 * Create a RESOURCE_UNKNOWN error.
 */
export function resourceUnknown(path: string): AssetDataError {
  return {
    type: "RESOURCE_UNKNOWN",
    path,
    message: `${path} has not been created or has no value`,
  };
}

/**
 * Create a RECORD_UNKNOWN error.
 */
export function recordUnknown(recordId: number): AssetDataError {
  return {
    type: "RECORD_UNKNOWN",
    recordId,
    message: `Record ${recordId} does not exist`,
  };
}

/**
 * Format an AssetDataError for logging.
 */
export function formatAssetDataError(error: AssetDataError): string {
  switch (error.type) {
    case "PUSH_FAILED":
      return `Push of ${error.path} failed: ${error.message}`;
    case "RESOURCE_UNKNOWN":
      return `Unknown resource: ${error.message}`;
    case "RECORD_UNKNOWN":
      return `Unknown record: ${error.message}`;
  }
}
