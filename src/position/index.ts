/**
 * Position Module - Public API
 */

export type { Coordinates, FixState, PositionService } from "./schema.js";

export { createSimulatedPositionService } from "./service.js";
