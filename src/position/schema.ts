/**
 * Position Module - Schemas and Types
 */

export type FixState = "FIX" | "NO_FIX";

export type Coordinates = Readonly<{
  latitude: number;
  longitude: number;
}>;

export interface PositionService {
  start(): void;
  /** Publish the current location; fire-and-forget */
  pushCurrentLocation(): FixState;
  stop(): void;
}
