/**
 * Truck Module - Pure Transformations
 *
 * The convergence model. No side effects - the service layer decides what
 * to publish and which actuators to drive.
 */
import type { Settings } from "../settings/index.js";
import type { PhysicalState } from "./schema.js";
import { FAN_DURATION_STEP, TEMPERATURE_STEP } from "./schema.js";

/**
 * Move `value` one step toward `target`. Not clamped: a value within one
 * step of the target overshoots and oscillates around it.
 */
export function converge(target: number, step: number, value: number): number {
  return value < target ? value + step : value - step;
}

export type TemperatureStep = Readonly<{
  currentTempC: number;
  /** The fan was cooling and the temperature reached the target */
  reachedTarget: boolean;
}>;

/**
 * One tick of temperature simulation.
 * Cooling toward target requires the fan on and the door closed; otherwise
 * the cargo drifts toward the outside temperature.
 */
export function stepTemperature(
  state: PhysicalState,
  settings: Pick<Settings, "targetTempC" | "outsideTempC">,
): TemperatureStep {
  if (state.fanOn && !state.doorOpen) {
    const currentTempC = converge(
      settings.targetTempC,
      TEMPERATURE_STEP,
      state.currentTempC,
    );
    return { currentTempC, reachedTarget: currentTempC <= settings.targetTempC };
  }

  return {
    currentTempC: converge(settings.outsideTempC, TEMPERATURE_STEP, state.currentTempC),
    reachedTarget: false,
  };
}

/**
 * Accrue fan running time for a tick the fan ran through.
 */
export function accrueFanDuration(state: PhysicalState): PhysicalState {
  if (!state.fanOn) return state;
  return { ...state, fanDurationMin: state.fanDurationMin + FAN_DURATION_STEP };
}

/**
 * Apply a fan switch. Turning the fan off always resets its duration.
 */
export function withFan(state: PhysicalState, on: boolean): PhysicalState {
  return on
    ? { ...state, fanOn: true }
    : { ...state, fanOn: false, fanDurationMin: 0 };
}

export function withDoor(state: PhysicalState, open: boolean): PhysicalState {
  return { ...state, doorOpen: open };
}
