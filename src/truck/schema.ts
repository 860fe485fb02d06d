/**
 * Truck Module - Schemas and Types
 *
 * Simulated physical state of the refrigerated truck and the constants of
 * the convergence model.
 */

export type PhysicalState = Readonly<{
  currentTempC: number;
  fanOn: boolean;
  /** Minutes the fan has been running; 0 whenever the fan is off */
  fanDurationMin: number;
  doorOpen: boolean;
}>;

/** Temperature change per simulation tick (°C) */
export const TEMPERATURE_STEP = 0.4;

/** Fan duration accrued per tick while the fan runs (minutes) */
export const FAN_DURATION_STEP = 5;

export const DEFAULT_START_TEMPERATURE = 5.2;

export function createInitialState(
  startTempC: number = DEFAULT_START_TEMPERATURE,
): PhysicalState {
  return {
    currentTempC: startTempC,
    fanOn: true,
    fanDurationMin: 0,
    doorOpen: false,
  };
}

/**
 * Mutable cell holding the current state, shared by the model and the
 * actuation dispatcher.
 */
export type StateRef = Readonly<{
  get(): PhysicalState;
  update(fn: (state: PhysicalState) => PhysicalState): PhysicalState;
}>;
