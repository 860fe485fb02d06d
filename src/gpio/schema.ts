/**
 * GPIO Module - Schemas and Types
 *
 * Pins of the IoT expansion slot used by the truck, and the GPIO service
 * contract.
 */
import type { BoardVariant } from "../settings/index.js";

export const PINS = {
  doorSwitch: 1,
  doorLed: 2,
  fanMotor: 3,
} as const;

export type Pin = (typeof PINS)[keyof typeof PINS];

export type Edge = "rising" | "falling" | "both";

export type EdgeHandler = (level: boolean) => void;

export interface GpioService {
  configureOutput(pin: Pin, initial: boolean): void;
  configureInput(pin: Pin): void;
  setOutput(pin: Pin, level: boolean): void;
  readOutput(pin: Pin): boolean;
  readInput(pin: Pin): boolean;
  registerEdgeHandler(
    pin: Pin,
    edge: Edge,
    handler: EdgeHandler,
    debounceMs: number,
  ): void;
  setBoardVariant(variant: BoardVariant): void;
}

/**
 * Door push button debounce, as wired on the reference board.
 */
export const DOOR_SWITCH_DEBOUNCE_MS = 100;
