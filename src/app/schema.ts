/**
 * App Module - Schemas and Types
 *
 * The explicit application context: every piece of core state is owned by
 * one TruckContext, built from injected collaborators.
 */
import type { ActuationDispatcher } from "../actuation/index.js";
import type { AssetDataSink } from "../asset-data/index.js";
import type { GpioService } from "../gpio/index.js";
import type { PositionService } from "../position/index.js";
import type { Scheduler } from "../scheduler/index.js";
import type { SettingsStore } from "../settings/index.js";
import type { KeyValueStorage } from "../storage/index.js";
import type { SampleAccumulator } from "../timeseries/index.js";
import type { PhysicalModel, StateRef } from "../truck/index.js";

export type TruckAppDeps = Readonly<{
  sink: AssetDataSink;
  storage: KeyValueStorage;
  gpio: GpioService;
  position: PositionService;
  startTempC: number;
  /** Accumulations per timeseries record */
  maxRecordCount: number;
  now?: () => number;
}>;

export type TruckContext = Readonly<{
  settings: SettingsStore;
  state: StateRef;
  model: PhysicalModel;
  accumulator: SampleAccumulator;
  dispatcher: ActuationDispatcher;
  scheduler: Scheduler;
}>;

export type TruckApp = Readonly<{
  /** Create resources, wire handlers and start both timers */
  start(): TruckContext;
  /** Stop the timers and the position service */
  stop(): void;
  /** The running context, null before start() and after stop() */
  context(): TruckContext | null;
}>;
