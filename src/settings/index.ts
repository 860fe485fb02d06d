/**
 * Settings Module - Public API
 */

// Types
export type {
  BoardVariant,
  PersistedSettings,
  SettingKey,
  Settings,
  StorageEntry,
} from "./schema.js";
export type { SettingsStore, SettingsUpdateError } from "./service.js";
export type { ResolvedSettings } from "./transform.js";

export {
  BOARD_VARIANTS,
  BoardVariantSchema,
  DEFAULT_SETTINGS,
  MAX_INTERVAL_SEC,
  STORAGE_KEYS,
  SettingsSchema,
} from "./schema.js";

// Service functions
export { createSettingsStore } from "./service.js";

// Pure transformations
export {
  boardVariantFromCode,
  resolveSettings,
  toStorageEntries,
} from "./transform.js";
