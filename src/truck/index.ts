/**
 * Truck Module - Public API
 */

export type { PhysicalState, StateRef } from "./schema.js";
export type { PhysicalModel } from "./service.js";
export type { TemperatureStep } from "./transform.js";

export {
  DEFAULT_START_TEMPERATURE,
  FAN_DURATION_STEP,
  TEMPERATURE_STEP,
  createInitialState,
} from "./schema.js";

export { createPhysicalModel, createStateRef } from "./service.js";

export {
  accrueFanDuration,
  converge,
  stepTemperature,
  withDoor,
  withFan,
} from "./transform.js";
