/**
 * Actuation Module - Pure Transformations
 *
 * Inbound path parsing. A path matches a setting or command when it equals
 * the full resource path or its final field token exactly.
 */
import { COMMAND_PATHS, SETTING_PATHS } from "../asset-data/index.js";
import type { CommandId, SettingId } from "./schema.js";
import { COMMAND_IDS, SETTING_IDS, SETTING_TOKENS } from "./schema.js";

const lastSegment = (path: string): string => path.slice(path.lastIndexOf(".") + 1);

export function parseSettingPath(path: string): SettingId | null {
  const token = lastSegment(path);
  return (
    SETTING_IDS.find(
      (id) => SETTING_PATHS[id] === path || SETTING_TOKENS[id] === token,
    ) ?? null
  );
}

export function parseCommandPath(path: string): CommandId | null {
  const token = lastSegment(path);
  return (
    COMMAND_IDS.find((id) => COMMAND_PATHS[id] === path || id === token) ?? null
  );
}
