/**
 * Scheduler Tests
 *
 * Timer behaviour under fake timers.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
  logOperationFailed: vi.fn(),
}));

import { logOperationFailed } from "../../logger.js";
import { createPeriodicTimer, createScheduler } from "../service.js";

describe("Scheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.clearAllMocks();
  });

  describe("createPeriodicTimer", () => {
    test("repeats forever at its interval", () => {
      const handler = vi.fn();
      const timer = createPeriodicTimer("generate", 5, handler);

      timer.start();
      vi.advanceTimersByTime(4999);
      expect(handler).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1);
      expect(handler).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(15000);
      expect(handler).toHaveBeenCalledTimes(4);
    });

    test("does not fire after stop", () => {
      const handler = vi.fn();
      const timer = createPeriodicTimer("publish", 20, handler);

      timer.start();
      timer.stop();
      vi.advanceTimersByTime(60000);

      expect(handler).not.toHaveBeenCalled();
      expect(timer.isRunning()).toBe(false);
    });

    test("keeps ticking after a handler throws", () => {
      const handler = vi.fn(() => {
        throw new Error("sink exploded");
      });
      const timer = createPeriodicTimer("generate", 1, handler);

      timer.start();
      vi.advanceTimersByTime(3000);

      expect(handler).toHaveBeenCalledTimes(3);
      expect(logOperationFailed).toHaveBeenCalledTimes(3);
    });
  });

  describe("createScheduler", () => {
    const setup = () => {
      const onGenerate = vi.fn();
      const onPublish = vi.fn();
      const scheduler = createScheduler({
        generateIntervalSec: 5,
        publishIntervalSec: 20,
        onGenerate,
        onPublish,
      });
      return { scheduler, onGenerate, onPublish };
    };

    test("fires both callbacks eagerly on start", () => {
      const { scheduler, onGenerate, onPublish } = setup();

      scheduler.start();

      expect(onGenerate).toHaveBeenCalledTimes(1);
      expect(onPublish).toHaveBeenCalledTimes(1);
    });

    test("runs each cycle on its own period", () => {
      const { scheduler, onGenerate, onPublish } = setup();

      scheduler.start();
      vi.advanceTimersByTime(20000);

      expect(onGenerate).toHaveBeenCalledTimes(5);
      expect(onPublish).toHaveBeenCalledTimes(2);
    });

    test("retimed generate fires at the new interval only", () => {
      const { scheduler, onGenerate } = setup();
      scheduler.start();
      vi.advanceTimersByTime(3000);
      onGenerate.mockClear();

      scheduler.reconfigure("generate", 10);

      // The old 5 s expiry (2 s away) must not fire
      vi.advanceTimersByTime(9999);
      expect(onGenerate).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1);
      expect(onGenerate).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(10000);
      expect(onGenerate).toHaveBeenCalledTimes(2);
      expect(scheduler.intervalOf("generate")).toBe(10);
    });

    test("retiming one timer leaves the other alone", () => {
      const { scheduler, onPublish } = setup();
      scheduler.start();
      onPublish.mockClear();

      scheduler.reconfigure("generate", 1);
      vi.advanceTimersByTime(20000);

      expect(onPublish).toHaveBeenCalledTimes(1);
    });

    test("does not restart timers after stop", () => {
      const { scheduler, onGenerate } = setup();
      scheduler.start();
      scheduler.stop();
      onGenerate.mockClear();

      scheduler.reconfigure("generate", 1);
      vi.advanceTimersByTime(10000);

      expect(onGenerate).not.toHaveBeenCalled();
      expect(scheduler.intervalOf("generate")).toBe(1);
    });
  });
});
