/**
 * Actuation Module - Schemas and Types
 *
 * Closed sets of remotely addressable settings and commands. Inbound paths
 * are parsed into these identifiers once, at the boundary.
 */
import type { COMMAND_PATHS, SETTING_PATHS } from "../asset-data/index.js";

export type SettingId = keyof typeof SETTING_PATHS;

export type CommandId = keyof typeof COMMAND_PATHS;

export const SETTING_IDS = [
  "targetTemperature",
  "outsideTemperature",
  "dataGenInterval",
  "dataPushInterval",
  "boardVariant",
] as const satisfies ReadonlyArray<SettingId>;

export const COMMAND_IDS = [
  "startFan",
  "stopFan",
  "openDoor",
  "closeDoor",
] as const satisfies ReadonlyArray<CommandId>;

/**
 * Field token of each setting, the last segment of its resource path.
 */
export const SETTING_TOKENS: Readonly<Record<SettingId, string>> = {
  targetTemperature: "target",
  outsideTemperature: "outside",
  dataGenInterval: "datagen",
  dataPushInterval: "datapush",
  boardVariant: "boardVariant",
};

export type SettingWriteOutcome =
  | "ignored"
  | "invalid"
  | "unchanged"
  | "updated"
  | "persist-failed";
