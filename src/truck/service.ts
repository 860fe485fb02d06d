/**
 * Truck Module - Service Layer
 *
 * Advances the simulated physical state once per generate tick and
 * publishes the recomputed temperature and fan duration.
 */
import {
  type AssetDataSink,
  VARIABLE_PATHS,
  logPushOutcome,
} from "../asset-data/index.js";
import { createLogger } from "../logger.js";
import type { Settings } from "../settings/index.js";
import type { PhysicalState, StateRef } from "./schema.js";
import { accrueFanDuration, stepTemperature } from "./transform.js";

const log = createLogger("truck");

export function createStateRef(initial: PhysicalState): StateRef {
  let current = initial;
  return {
    get: () => current,
    update(fn) {
      current = fn(current);
      return current;
    },
  };
}

export type PhysicalModel = Readonly<{
  advance(): PhysicalState;
}>;

export function createPhysicalModel(deps: {
  state: StateRef;
  settings: () => Settings;
  /** Switch the fan through the actuation path (publish, motor output, reset) */
  switchFan: (on: boolean, publish: boolean) => void;
  sink: AssetDataSink;
}): PhysicalModel {
  const { state, sink } = deps;

  return {
    advance() {
      const settings = deps.settings();
      const before = state.get();
      const step = stepTemperature(before, settings);
      const cooling = before.fanOn && !before.doorOpen;

      state.update((s) => ({ ...s, currentTempC: step.currentTempC }));

      if (cooling) {
        log.debug(
          { target: settings.targetTempC, current: step.currentTempC },
          "Converging to target temperature",
        );
      } else {
        log.debug(
          { outside: settings.outsideTempC, current: step.currentTempC },
          "Converging to outside temperature",
        );
      }

      if (step.reachedTarget) {
        log.info({ target: settings.targetTempC }, "Reached target temperature, turning off fan");
        deps.switchFan(false, true);
      }

      const next = state.update(accrueFanDuration);

      sink.setValue(VARIABLE_PATHS.temperature, next.currentTempC);
      sink.setValue(VARIABLE_PATHS.fanDuration, next.fanDurationMin);
      logPushOutcome(log, VARIABLE_PATHS.temperature, sink.push(VARIABLE_PATHS.temperature));
      logPushOutcome(log, VARIABLE_PATHS.fanDuration, sink.push(VARIABLE_PATHS.fanDuration));

      return next;
    },
  };
}
