/**
 * App Module - Pure Transformations
 */
import type { SettingId } from "../actuation/index.js";
import type { AssetValue } from "../asset-data/index.js";
import type { Settings } from "../settings/index.js";

/**
 * Value of each remote setting resource for the given settings.
 */
export function settingValues(
  settings: Settings,
): Readonly<Record<SettingId, AssetValue>> {
  return {
    targetTemperature: settings.targetTempC,
    outsideTemperature: settings.outsideTempC,
    dataGenInterval: settings.dataGenIntervalSec,
    dataPushInterval: settings.dataPushIntervalSec,
    boardVariant: settings.boardVariant,
  };
}
