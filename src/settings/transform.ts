/**
 * Settings Module - Pure Transformations
 *
 * Resolving persisted values against defaults and flattening settings into
 * storage entries.
 */
import type { z } from "zod";

import type {
  BoardVariant,
  PersistedSettings,
  SettingKey,
  Settings,
  StorageEntry,
} from "./schema.js";
import {
  BOARD_VARIANTS,
  BOARD_VARIANT_CODES,
  DEFAULT_SETTINGS,
  STORAGE_KEYS,
  SettingsSchema,
} from "./schema.js";

export type ResolvedSettings = Readonly<{
  settings: Settings;
  /** Keys that were absent or invalid and fell back to their default */
  missing: ReadonlyArray<SettingKey>;
}>;

export function boardVariantFromCode(code: number): BoardVariant | null {
  return BOARD_VARIANTS.find((v) => BOARD_VARIANT_CODES[v] === code) ?? null;
}

/**
 * Resolve persisted values into settings, one key at a time.
 * Every key that is absent or fails validation keeps its default.
 */
export function resolveSettings(persisted: PersistedSettings): ResolvedSettings {
  const missing: SettingKey[] = [];

  const pick = <T>(key: SettingKey, schema: z.ZodType<T>, raw: unknown, fallback: T): T => {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      missing.push(key);
      return fallback;
    }
    return parsed.data;
  };

  const shape = SettingsSchema.shape;
  const variantCode = persisted.boardVariant;

  const settings: Settings = {
    dataGenIntervalSec: pick(
      "dataGenIntervalSec",
      shape.dataGenIntervalSec,
      persisted.dataGenIntervalSec,
      DEFAULT_SETTINGS.dataGenIntervalSec,
    ),
    dataPushIntervalSec: pick(
      "dataPushIntervalSec",
      shape.dataPushIntervalSec,
      persisted.dataPushIntervalSec,
      DEFAULT_SETTINGS.dataPushIntervalSec,
    ),
    outsideTempC: pick(
      "outsideTempC",
      shape.outsideTempC,
      persisted.outsideTempC,
      DEFAULT_SETTINGS.outsideTempC,
    ),
    targetTempC: pick(
      "targetTempC",
      shape.targetTempC,
      persisted.targetTempC,
      DEFAULT_SETTINGS.targetTempC,
    ),
    boardVariant: pick(
      "boardVariant",
      shape.boardVariant,
      variantCode === undefined ? undefined : boardVariantFromCode(variantCode),
      DEFAULT_SETTINGS.boardVariant,
    ),
  };

  return { settings, missing };
}

/**
 * Flatten settings into the full snapshot written to storage.
 */
export function toStorageEntries(settings: Settings): StorageEntry[] {
  return [
    {
      key: STORAGE_KEYS.dataGenIntervalSec,
      kind: "int",
      value: settings.dataGenIntervalSec,
    },
    {
      key: STORAGE_KEYS.dataPushIntervalSec,
      kind: "int",
      value: settings.dataPushIntervalSec,
    },
    { key: STORAGE_KEYS.outsideTempC, kind: "int", value: settings.outsideTempC },
    { key: STORAGE_KEYS.targetTempC, kind: "float", value: settings.targetTempC },
    {
      key: STORAGE_KEYS.boardVariant,
      kind: "int",
      value: BOARD_VARIANT_CODES[settings.boardVariant],
    },
  ];
}
