/**
 * Scheduler Module - Service Layer
 *
 * Drives the generate cycle (advance the simulation, accumulate samples)
 * and the publish cycle (push fan and door status) on two independent
 * repeating timers.
 */
import { createLogger, logOperationFailed } from "../logger.js";
import type { PeriodicTimer, Scheduler, TimerName } from "./schema.js";

const log = createLogger("scheduler");

/**
 * Run a tick handler, logging instead of throwing so one bad tick never
 * takes the timer down.
 */
function runTick(name: TimerName, handler: () => void): void {
  try {
    handler();
  } catch (error) {
    logOperationFailed(log, `${name}Tick`, error);
  }
}

export function createPeriodicTimer(
  name: TimerName,
  initialIntervalSec: number,
  handler: () => void,
): PeriodicTimer {
  let intervalSec = initialIntervalSec;
  let handle: ReturnType<typeof setInterval> | null = null;

  return {
    name,

    start() {
      if (handle) return;
      handle = setInterval(() => runTick(name, handler), intervalSec * 1000);
    },

    stop() {
      if (handle) {
        clearInterval(handle);
        handle = null;
      }
    },

    setInterval(next) {
      intervalSec = next;
    },

    intervalSec: () => intervalSec,

    isRunning: () => handle !== null,
  };
}

export function createScheduler(options: {
  generateIntervalSec: number;
  publishIntervalSec: number;
  onGenerate: () => void;
  onPublish: () => void;
}): Scheduler {
  const timers: Readonly<Record<TimerName, PeriodicTimer>> = {
    generate: createPeriodicTimer("generate", options.generateIntervalSec, options.onGenerate),
    publish: createPeriodicTimer("publish", options.publishIntervalSec, options.onPublish),
  };

  return {
    start() {
      runTick("generate", options.onGenerate);
      timers.generate.start();

      runTick("publish", options.onPublish);
      timers.publish.start();

      log.info(
        {
          generateIntervalSec: timers.generate.intervalSec(),
          publishIntervalSec: timers.publish.intervalSec(),
        },
        "Timers started",
      );
    },

    stop() {
      timers.generate.stop();
      timers.publish.stop();
      log.info("Timers stopped");
    },

    reconfigure(name, intervalSec) {
      const timer = timers[name];
      const previous = timer.intervalSec();
      const wasRunning = timer.isRunning();

      timer.stop();
      timer.setInterval(intervalSec);
      if (wasRunning) {
        timer.start();
      }

      log.info({ timer: name, from: previous, to: intervalSec }, "Timer interval changed");
    },

    intervalOf: (name) => timers[name].intervalSec(),
  };
}
