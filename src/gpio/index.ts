/**
 * GPIO Module - Public API
 */

export type { Edge, EdgeHandler, GpioService, Pin } from "./schema.js";
export type { SimulatedGpio } from "./service.js";

export { DOOR_SWITCH_DEBOUNCE_MS, PINS } from "./schema.js";

export { createSimulatedGpio } from "./service.js";

export { isBounce, matchesEdge } from "./transform.js";
