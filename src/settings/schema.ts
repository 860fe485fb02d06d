/**
 * Settings Module - Schemas and Types
 *
 * Tunable truck parameters, their defaults and their persisted layout.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Board Variant
// =============================================================================

export const BOARD_VARIANTS = ["red", "green", "yellow"] as const;

export const BoardVariantSchema = z.enum(BOARD_VARIANTS);

export type BoardVariant = z.infer<typeof BoardVariantSchema>;

/**
 * Persisted integer code of each board variant.
 */
export const BOARD_VARIANT_CODES: Readonly<Record<BoardVariant, number>> = {
  red: 0,
  green: 1,
  yellow: 2,
};

// =============================================================================
// Settings
// =============================================================================

/**
 * Longest interval a Node.js timer can hold (2^31-1 ms); longer delays
 * are clamped to 1 ms by the runtime.
 */
export const MAX_INTERVAL_SEC = 2_147_483;

export const SettingsSchema = z.object({
  dataGenIntervalSec: z
    .number()
    .int()
    .positive()
    .max(MAX_INTERVAL_SEC)
    .describe("Seconds between simulation ticks"),
  dataPushIntervalSec: z
    .number()
    .int()
    .positive()
    .max(MAX_INTERVAL_SEC)
    .describe("Seconds between fan/door status pushes"),
  outsideTempC: z.number().int().describe("Outside air temperature (°C)"),
  targetTempC: z.number().finite().describe("Regulated cargo temperature (°C)"),
  boardVariant: BoardVariantSchema.describe("Board the GPIOs are wired on"),
});

export type Settings = Readonly<z.infer<typeof SettingsSchema>>;

export type SettingKey = keyof Settings;

export const DEFAULT_SETTINGS: Settings = {
  dataGenIntervalSec: 5,
  dataPushIntervalSec: 20,
  outsideTempC: 27,
  targetTempC: 2.2,
  boardVariant: "red",
};

// =============================================================================
// Persistence Layout
// =============================================================================

export const STORAGE_KEYS: Readonly<Record<SettingKey, string>> = {
  dataGenIntervalSec: "/reeferTruck/DataGenInterval",
  dataPushIntervalSec: "/reeferTruck/DataPushInterval",
  outsideTempC: "/reeferTruck/OutsideTemperature",
  targetTempC: "/reeferTruck/TargetTemperature",
  boardVariant: "/reeferTruck/BoardVariant",
};

/**
 * Raw values as read from storage, one per setting; undefined when absent.
 */
export type PersistedSettings = Readonly<Record<SettingKey, number | undefined>>;

/**
 * A setting as it is written to storage.
 */
export type StorageEntry = Readonly<{
  key: string;
  kind: "int" | "float";
  value: number;
}>;
