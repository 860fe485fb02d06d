/**
 * GPIO Service Tests
 */
import { beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
  }),
}));

import { PINS } from "../schema.js";
import { createSimulatedGpio, type SimulatedGpio } from "../service.js";

describe("GPIO", () => {
  describe("createSimulatedGpio", () => {
    let clock: number;
    let gpio: SimulatedGpio;

    beforeEach(() => {
      clock = 0;
      gpio = createSimulatedGpio({ now: () => clock });
    });

    test("outputs hold the level they are set to", () => {
      gpio.configureOutput(PINS.fanMotor, true);
      expect(gpio.readOutput(PINS.fanMotor)).toBe(true);

      gpio.setOutput(PINS.fanMotor, false);
      expect(gpio.readOutput(PINS.fanMotor)).toBe(false);
    });

    test("writing an unconfigured pin throws", () => {
      expect(() => gpio.setOutput(PINS.doorLed, true)).toThrow(
        "GPIO 2 is not configured as output",
      );
    });

    test("inputs idle high", () => {
      gpio.configureInput(PINS.doorSwitch);
      expect(gpio.readInput(PINS.doorSwitch)).toBe(true);
    });

    test("debounces rising edges", () => {
      const handler = vi.fn();
      gpio.configureInput(PINS.doorSwitch);
      gpio.registerEdgeHandler(PINS.doorSwitch, "rising", handler, 100);

      gpio.driveInput(PINS.doorSwitch, false);
      clock = 10;
      gpio.driveInput(PINS.doorSwitch, true);
      clock = 50;
      gpio.driveInput(PINS.doorSwitch, false);
      gpio.driveInput(PINS.doorSwitch, true);
      clock = 200;
      gpio.driveInput(PINS.doorSwitch, false);
      gpio.driveInput(PINS.doorSwitch, true);

      expect(handler).toHaveBeenCalledTimes(2);
      expect(handler).toHaveBeenCalledWith(true);
    });

    test("remembers the board variant", () => {
      expect(gpio.getBoardVariant()).toBeNull();
      gpio.setBoardVariant("green");
      expect(gpio.getBoardVariant()).toBe("green");
    });
  });
});
