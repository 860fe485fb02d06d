/**
 * Truck Transform Tests
 *
 * Convergence model over plain state values.
 */
import { describe, expect, it } from "vitest";

import { type PhysicalState, createInitialState } from "../schema.js";
import {
  accrueFanDuration,
  converge,
  stepTemperature,
  withDoor,
  withFan,
} from "../transform.js";

const SETTINGS = { targetTempC: 2.2, outsideTempC: 27 };

describe("Truck Transform", () => {
  describe("converge", () => {
    it("adds the step below the target", () => {
      expect(converge(10, 0.5, 9)).toBe(9.5);
    });

    it("subtracts the step above the target", () => {
      expect(converge(10, 0.5, 11)).toBe(10.5);
    });

    it("subtracts the step when exactly on target", () => {
      expect(converge(10, 0.5, 10)).toBe(9.5);
    });

    it("overshoots instead of clamping", () => {
      expect(converge(10, 0.5, 9.8)).toBeCloseTo(10.3);
    });
  });

  describe("stepTemperature", () => {
    it("cools toward target with fan on and door closed", () => {
      const step = stepTemperature(createInitialState(5.2), SETTINGS);

      expect(step.currentTempC).toBeCloseTo(4.8);
      expect(step.reachedTarget).toBe(false);
    });

    it("drifts toward outside with the door open", () => {
      const state = withDoor(createInitialState(5.2), true);

      const step = stepTemperature(state, SETTINGS);

      expect(step.currentTempC).toBeCloseTo(5.6);
      expect(step.reachedTarget).toBe(false);
    });

    it("drifts toward outside with the fan off", () => {
      const state = withFan(createInitialState(5.2), false);

      expect(stepTemperature(state, SETTINGS).currentTempC).toBeCloseTo(5.6);
    });

    it("drifts down when warmer than outside", () => {
      const state = withFan({ ...createInitialState(), currentTempC: 30 }, false);

      expect(stepTemperature(state, SETTINGS).currentTempC).toBeCloseTo(29.6);
    });

    it("moves monotonically toward target by exactly one step per tick", () => {
      let state: PhysicalState = createInitialState(5.2);
      const temperatures: number[] = [];

      for (let tick = 0; tick < 7; tick++) {
        const step = stepTemperature(state, SETTINGS);
        expect(step.reachedTarget).toBe(false);
        expect(state.currentTempC - step.currentTempC).toBeCloseTo(0.4);
        temperatures.push(step.currentTempC);
        state = { ...state, currentTempC: step.currentTempC };
      }

      expect(temperatures[6]).toBeCloseTo(2.4);
      const eighth = stepTemperature(state, SETTINGS);
      expect(eighth.currentTempC).toBeCloseTo(2.0);
      expect(eighth.reachedTarget).toBe(true);
    });

    it("reports reaching target when starting below it", () => {
      const state = { ...createInitialState(), currentTempC: 1.0 };

      const step = stepTemperature(state, SETTINGS);

      expect(step.currentTempC).toBeCloseTo(1.4);
      expect(step.reachedTarget).toBe(true);
    });
  });

  describe("fan duration", () => {
    it("accrues while the fan runs", () => {
      expect(accrueFanDuration(createInitialState()).fanDurationMin).toBe(5);
    });

    it("does not accrue with the fan off", () => {
      const state = withFan(createInitialState(), false);

      expect(accrueFanDuration(state)).toBe(state);
    });

    it("resets when the fan is switched off", () => {
      const running = { ...createInitialState(), fanDurationMin: 35 };

      expect(withFan(running, false)).toEqual({
        currentTempC: 5.2,
        fanOn: false,
        fanDurationMin: 0,
        doorOpen: false,
      });
    });

    it("keeps the duration when the fan is switched on again", () => {
      const running = { ...createInitialState(), fanDurationMin: 35 };

      expect(withFan(running, true).fanDurationMin).toBe(35);
    });
  });
});
