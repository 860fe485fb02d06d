/**
 * Actuation Module - Public API
 */

export type { CommandId, SettingId, SettingWriteOutcome } from "./schema.js";
export type { ActuationDispatcher } from "./service.js";

export { COMMAND_IDS, SETTING_IDS, SETTING_TOKENS } from "./schema.js";

export { createActuationDispatcher } from "./service.js";

export { parseCommandPath, parseSettingPath } from "./transform.js";
