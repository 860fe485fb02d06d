/**
 * App Module - Public API
 */

export type { TruckApp, TruckAppDeps, TruckContext } from "./schema.js";

export { createTruckApp } from "./service.js";

export { settingValues } from "./transform.js";
