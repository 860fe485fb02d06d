/**
 * GPIO Module - Service Layer
 *
 * In-process simulated pin bank. Outputs are plain levels, inputs are driven
 * with driveInput() to emulate the door push button.
 */
import { createLogger } from "../logger.js";
import type { BoardVariant } from "../settings/index.js";
import type { Edge, EdgeHandler, GpioService, Pin } from "./schema.js";
import { isBounce, matchesEdge } from "./transform.js";

const log = createLogger("gpio");

type PinState = {
  direction: "input" | "output";
  level: boolean;
};

type EdgeSubscription = {
  edge: Edge;
  handler: EdgeHandler;
  debounceMs: number;
  lastAcceptedAt: number | null;
};

export type SimulatedGpio = GpioService &
  Readonly<{
    /** Set an input level as the physical pin would see it */
    driveInput(pin: Pin, level: boolean): void;
    getBoardVariant(): BoardVariant | null;
  }>;

export function createSimulatedGpio(
  options: { now?: () => number } = {},
): SimulatedGpio {
  const now = options.now ?? Date.now;
  const pins = new Map<Pin, PinState>();
  const subscriptions = new Map<Pin, EdgeSubscription[]>();
  let boardVariant: BoardVariant | null = null;

  const requirePin = (pin: Pin, direction: PinState["direction"]): PinState => {
    const state = pins.get(pin);
    if (!state || state.direction !== direction) {
      throw new Error(`GPIO ${pin} is not configured as ${direction}`);
    }
    return state;
  };

  return {
    configureOutput(pin, initial) {
      pins.set(pin, { direction: "output", level: initial });
      log.debug({ pin, initial }, "Configured output");
    },

    configureInput(pin) {
      // Pull-up: idle level is high
      pins.set(pin, { direction: "input", level: true });
      log.debug({ pin }, "Configured input");
    },

    setOutput(pin, level) {
      requirePin(pin, "output").level = level;
    },

    readOutput: (pin) => requirePin(pin, "output").level,

    readInput: (pin) => requirePin(pin, "input").level,

    registerEdgeHandler(pin, edge, handler, debounceMs) {
      const list = subscriptions.get(pin) ?? [];
      list.push({ edge, handler, debounceMs, lastAcceptedAt: null });
      subscriptions.set(pin, list);
    },

    setBoardVariant(variant) {
      if (boardVariant !== variant) {
        log.info({ from: boardVariant, to: variant }, "Board variant set");
      }
      boardVariant = variant;
    },

    getBoardVariant: () => boardVariant,

    driveInput(pin, level) {
      const state = requirePin(pin, "input");
      const previous = state.level;
      state.level = level;

      const at = now();
      for (const sub of subscriptions.get(pin) ?? []) {
        if (!matchesEdge(sub.edge, previous, level)) continue;
        if (isBounce(sub.lastAcceptedAt, at, sub.debounceMs)) {
          log.trace({ pin }, "Edge ignored (bounce)");
          continue;
        }
        sub.lastAcceptedAt = at;
        sub.handler(level);
      }
    },
  };
}
