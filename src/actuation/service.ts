/**
 * Actuation Module - Service Layer
 *
 * Maps remote setting writes, remote commands and the door push button to
 * local state changes, actuator outputs and immediate pushes.
 */
import type { z } from "zod";

import {
  type AssetDataSink,
  type AssetValue,
  type CommandRequest,
  SETTING_PATHS,
  VARIABLE_PATHS,
  logPushOutcome,
} from "../asset-data/index.js";
import { type GpioService, PINS } from "../gpio/index.js";
import { createLogger, logOperationFailed } from "../logger.js";
import type { Scheduler } from "../scheduler/index.js";
import {
  type Settings,
  type SettingsStore,
  SettingsSchema,
} from "../settings/index.js";
import { type StateRef, withDoor, withFan } from "../truck/index.js";
import type { CommandId, SettingId, SettingWriteOutcome } from "./schema.js";
import { parseCommandPath, parseSettingPath } from "./transform.js";

const log = createLogger("actuation");

export type ActuationDispatcher = Readonly<{
  switchFan(on: boolean, publish: boolean): void;
  switchDoor(open: boolean, publish: boolean): void;
  /** Door push button: toggle from the current door LED level */
  toggleDoorFromSwitch(): void;
  handleSettingWrite(path: string): SettingWriteOutcome;
  /** Always acknowledges OK; returns the command that ran, if any */
  handleCommand(path: string, request: CommandRequest): CommandId | null;
}>;

export function createActuationDispatcher(deps: {
  state: StateRef;
  settings: SettingsStore;
  sink: AssetDataSink;
  gpio: GpioService;
  scheduler: Pick<Scheduler, "reconfigure">;
}): ActuationDispatcher {
  const { state, settings, sink, gpio, scheduler } = deps;

  const publishNow = (path: string, value: AssetValue): void => {
    sink.setValue(path, value);
    logPushOutcome(log, path, sink.push(path));
  };

  const switchFan = (on: boolean, publish: boolean): void => {
    state.update((s) => withFan(s, on));
    if (publish) {
      publishNow(VARIABLE_PATHS.fanOn, on);
    }
    gpio.setOutput(PINS.fanMotor, on);
  };

  const switchDoor = (open: boolean, publish: boolean): void => {
    state.update((s) => withDoor(s, open));
    if (publish) {
      publishNow(VARIABLE_PATHS.doorOpen, open);
    }
    gpio.setOutput(PINS.doorLed, open);
  };

  // ===========================================================================
  // Setting Writes
  // ===========================================================================

  /**
   * Read and validate the value the server wrote for a setting. An invalid
   * value is replaced in the sink by the current one.
   */
  const readWritten = <T extends AssetValue>(
    id: SettingId,
    schema: z.ZodType<T>,
    current: T,
  ): T | null => {
    const path = SETTING_PATHS[id];
    const raw = sink.getValue(path);
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      log.warn(
        { setting: id, value: raw, issues: parsed.error.issues.map((i) => i.message) },
        "Rejected invalid setting value",
      );
      sink.setValue(path, current);
      return null;
    }
    return parsed.data;
  };

  const apply = <T extends AssetValue>(
    id: SettingId,
    previous: T,
    next: T | null,
    patch: (value: T) => Partial<Settings>,
    onChanged?: (value: T) => void,
  ): SettingWriteOutcome => {
    if (next === null) {
      return "invalid";
    }
    if (next === previous) {
      log.info({ setting: id, value: previous }, "Setting unchanged");
      return "unchanged";
    }

    const updated = settings.update(patch(next));
    onChanged?.(next);

    if (updated.isErr()) {
      logOperationFailed(log, "writeSetting", updated.error.type, { setting: id });
      return "persist-failed";
    }

    log.info({ setting: id, from: previous, to: next }, "Setting changed");
    return "updated";
  };

  const handleSettingWrite = (path: string): SettingWriteOutcome => {
    const id = parseSettingPath(path);
    if (id === null) {
      log.debug({ path }, "Write to unknown setting ignored");
      return "ignored";
    }

    const current = settings.get();
    const shape = SettingsSchema.shape;

    switch (id) {
      case "dataGenInterval":
        return apply(
          id,
          current.dataGenIntervalSec,
          readWritten(id, shape.dataGenIntervalSec, current.dataGenIntervalSec),
          (v) => ({ dataGenIntervalSec: v }),
          (v) => scheduler.reconfigure("generate", v),
        );
      case "dataPushInterval":
        return apply(
          id,
          current.dataPushIntervalSec,
          readWritten(id, shape.dataPushIntervalSec, current.dataPushIntervalSec),
          (v) => ({ dataPushIntervalSec: v }),
          (v) => scheduler.reconfigure("publish", v),
        );
      case "targetTemperature":
        return apply(
          id,
          current.targetTempC,
          readWritten(id, shape.targetTempC, current.targetTempC),
          (v) => ({ targetTempC: v }),
        );
      case "outsideTemperature":
        return apply(
          id,
          current.outsideTempC,
          readWritten(id, shape.outsideTempC, current.outsideTempC),
          (v) => ({ outsideTempC: v }),
        );
      case "boardVariant":
        return apply(
          id,
          current.boardVariant,
          readWritten(id, shape.boardVariant, current.boardVariant),
          (v) => ({ boardVariant: v }),
          (v) => gpio.setBoardVariant(v),
        );
    }
  };

  // ===========================================================================
  // Commands
  // ===========================================================================

  const runCommand = (id: CommandId): void => {
    switch (id) {
      case "startFan":
        switchFan(true, true);
        break;
      case "stopFan":
        switchFan(false, true);
        break;
      case "openDoor":
        switchDoor(true, true);
        break;
      case "closeDoor":
        switchDoor(false, true);
        break;
    }
  };

  const handleCommand = (
    path: string,
    request: CommandRequest,
  ): CommandId | null => {
    const id = parseCommandPath(path);

    if (id === null) {
      log.debug({ path }, "Unknown command ignored");
    } else {
      log.info({ command: id, requestId: request.requestId }, "Execute command request");
      try {
        runCommand(id);
      } catch (error) {
        logOperationFailed(log, id, error, { requestId: request.requestId });
      }
    }

    // Commands are always reported as executed
    sink.replyCommandResult(request, "OK");
    return id;
  };

  return {
    switchFan,
    switchDoor,

    toggleDoorFromSwitch() {
      const open = !gpio.readOutput(PINS.doorLed);
      log.info({ open }, "Door switch pressed");
      switchDoor(open, true);
    },

    handleSettingWrite,
    handleCommand,
  };
}
