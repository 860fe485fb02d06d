/**
 * Asset-Data Module - Public API
 */

// Types
export type {
  AssetDataSink,
  AssetValue,
  CommandHandler,
  CommandRequest,
  CommandStatus,
  RecordHandle,
  RecordStatus,
  RecordedSample,
  ResourceKind,
  WriteHandler,
} from "./schema.js";
export type { AssetDataError } from "./errors.js";
export type { AssetDataSinkOptions, MqttTransport } from "./service.js";

export { COMMAND_PATHS, SETTING_PATHS, VARIABLE_PATHS } from "./schema.js";

// Error utilities
export { formatAssetDataError } from "./errors.js";

// Service functions (side effects)
export {
  createMqttAssetDataSink,
  logPushOutcome,
  openSession,
  releaseSession,
} from "./service.js";

// Pure transformations
export {
  classifyTopic,
  parseCommandRequest,
  parseWriteValue,
} from "./transform.js";
