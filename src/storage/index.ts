/**
 * Storage Module - Public API
 */

export type { KeyValueStorage, StorageFile } from "./schema.js";
export type { StorageError } from "./errors.js";

export { formatStorageError } from "./errors.js";

export {
  createJsonFileStorage,
  createMemoryStorage,
  readStorageFile,
} from "./service.js";
