/**
 * App Module - Service Layer
 *
 * Wires settings, physical model, accumulator, dispatcher and scheduler to
 * the external collaborators, creates the remote resources and runs the
 * generate and publish cycles.
 */
import {
  COMMAND_IDS,
  SETTING_IDS,
  createActuationDispatcher,
} from "../actuation/index.js";
import {
  COMMAND_PATHS,
  SETTING_PATHS,
  VARIABLE_PATHS,
  logPushOutcome,
} from "../asset-data/index.js";
import { DOOR_SWITCH_DEBOUNCE_MS, PINS } from "../gpio/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationStart,
} from "../logger.js";
import { createScheduler } from "../scheduler/index.js";
import { createSettingsStore } from "../settings/index.js";
import { createSampleAccumulator } from "../timeseries/index.js";
import {
  createInitialState,
  createPhysicalModel,
  createStateRef,
} from "../truck/index.js";
import type { TruckApp, TruckAppDeps, TruckContext } from "./schema.js";
import { settingValues } from "./transform.js";

const log = createLogger("app");

const TRUCK_VARIABLES = [
  VARIABLE_PATHS.fanOn,
  VARIABLE_PATHS.fanDuration,
  VARIABLE_PATHS.temperature,
  VARIABLE_PATHS.doorOpen,
] as const;

export function createTruckApp(deps: TruckAppDeps): TruckApp {
  const { sink, storage, gpio, position } = deps;
  const now = deps.now ?? Date.now;
  let running: TruckContext | null = null;

  // ===========================================================================
  // Context Construction
  // ===========================================================================

  const build = (): TruckContext => {
    const settings = createSettingsStore(storage);
    const loaded = settings.load();
    const state = createStateRef(createInitialState(deps.startTempC));

    // Timer callbacks only fire after start(), once model and accumulator exist
    const scheduler = createScheduler({
      generateIntervalSec: loaded.dataGenIntervalSec,
      publishIntervalSec: loaded.dataPushIntervalSec,
      onGenerate: () => generate(),
      onPublish: () => publish(),
    });

    const dispatcher = createActuationDispatcher({
      state,
      settings,
      sink,
      gpio,
      scheduler,
    });

    const model = createPhysicalModel({
      state,
      settings: settings.get,
      switchFan: dispatcher.switchFan,
      sink,
    });

    const accumulator = createSampleAccumulator({
      sink,
      position,
      maxRecordCount: deps.maxRecordCount,
    });

    const generate = (): void => {
      model.advance();
      accumulator.accumulate(state.get(), now());
    };

    const publish = (): void => {
      const current = state.get();
      log.debug({ fanOn: current.fanOn, doorOpen: current.doorOpen }, "Publishing status");

      sink.setValue(VARIABLE_PATHS.fanOn, current.fanOn);
      logPushOutcome(log, VARIABLE_PATHS.fanOn, sink.push(VARIABLE_PATHS.fanOn));

      sink.setValue(VARIABLE_PATHS.doorOpen, current.doorOpen);
      logPushOutcome(log, VARIABLE_PATHS.doorOpen, sink.push(VARIABLE_PATHS.doorOpen));
    };

    return { settings, state, model, accumulator, dispatcher, scheduler };
  };

  // ===========================================================================
  // Startup Steps
  // ===========================================================================

  const configureGpio = (ctx: TruckContext): void => {
    gpio.configureOutput(PINS.fanMotor, false);
    gpio.configureOutput(PINS.doorLed, false);
    gpio.configureInput(PINS.doorSwitch);
    gpio.registerEdgeHandler(
      PINS.doorSwitch,
      "rising",
      () => ctx.dispatcher.toggleDoorFromSwitch(),
      DOOR_SWITCH_DEBOUNCE_MS,
    );
  };

  const createVariables = (ctx: TruckContext): void => {
    for (const path of TRUCK_VARIABLES) {
      sink.createResource(path, "variable");
    }

    const initial = ctx.state.get();
    sink.setValue(VARIABLE_PATHS.temperature, initial.currentTempC);
    sink.setValue(VARIABLE_PATHS.fanDuration, initial.fanDurationMin);
    sink.setValue(VARIABLE_PATHS.fanOn, initial.fanOn);
    sink.setValue(VARIABLE_PATHS.doorOpen, initial.doorOpen);

    ctx.dispatcher.switchFan(initial.fanOn, false);
    ctx.dispatcher.switchDoor(initial.doorOpen, false);
  };

  const createSettings = (ctx: TruckContext): void => {
    const values = settingValues(ctx.settings.get());

    for (const id of SETTING_IDS) {
      const path = SETTING_PATHS[id];
      sink.createResource(path, "setting");
      sink.setValue(path, values[id]);
      sink.registerWriteHandler(path, (written) => {
        if (running !== ctx) {
          log.debug({ path: written }, "Write after stop ignored");
          return;
        }
        ctx.dispatcher.handleSettingWrite(written);
      });
    }
  };

  const createCommands = (ctx: TruckContext): void => {
    for (const id of COMMAND_IDS) {
      const path = COMMAND_PATHS[id];
      sink.createResource(path, "command");
      sink.registerCommandHandler(path, (invoked, request) => {
        if (running !== ctx) {
          log.debug({ path: invoked }, "Command after stop not executed");
          sink.replyCommandResult(request, "OK");
          return;
        }
        ctx.dispatcher.handleCommand(invoked, request);
      });
    }
  };

  return {
    start() {
      if (running) {
        log.warn("Truck already started");
        return running;
      }

      const startTime = Date.now();
      logOperationStart(log, "startTruck");

      const ctx = build();
      const settings = ctx.settings.get();
      gpio.setBoardVariant(settings.boardVariant);

      position.start();
      configureGpio(ctx);
      createVariables(ctx);
      createSettings(ctx);
      createCommands(ctx);

      ctx.scheduler.start();
      running = ctx;

      logOperationComplete(log, "startTruck", startTime, { ...settings });
      return ctx;
    },

    stop() {
      if (!running) return;

      running.scheduler.stop();
      position.stop();
      running = null;
      log.info("Truck stopped");
    },

    context: () => running,
  };
}
