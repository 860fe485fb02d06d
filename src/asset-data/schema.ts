/**
 * Asset-Data Module - Schemas and Types
 *
 * The remote asset-data contract: resource kinds, push and record outcomes,
 * and the wire shapes exchanged with the device-management server.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { AssetDataError } from "./errors.js";

// =============================================================================
// Resources
// =============================================================================

/**
 * Variables are server-read-only, settings are server-writable,
 * commands are server-invocable actions.
 */
export type ResourceKind = "variable" | "setting" | "command";

export type AssetValue = boolean | number | string;

/**
 * Outcome of recording a single sample into a timeseries record.
 * "full" signals buffer exhaustion; "error" covers unknown handles.
 */
export type RecordStatus = "ok" | "full" | "error";

export type CommandStatus = "OK" | "FAULT";

/**
 * Opaque reference to an open timeseries record.
 */
export type RecordHandle = Readonly<{ id: number }>;

/**
 * An inbound command invocation, kept so the reply can be correlated.
 */
export type CommandRequest = Readonly<{
  path: string;
  requestId: string | null;
  receivedAt: number;
}>;

export type WriteHandler = (path: string) => void;
export type CommandHandler = (path: string, request: CommandRequest) => void;

/**
 * The remote asset-data store as seen by the truck core.
 * Pushes resolve to a Result and never reject.
 */
export interface AssetDataSink {
  createResource(path: string, kind: ResourceKind): void;
  setValue(path: string, value: AssetValue): void;
  getValue(path: string): AssetValue | undefined;
  push(path: string): Promise<Result<void, AssetDataError>>;
  createRecord(): RecordHandle;
  recordSample(
    handle: RecordHandle,
    path: string,
    value: number,
    timestampMs: number,
  ): RecordStatus;
  pushRecord(handle: RecordHandle): Promise<Result<void, AssetDataError>>;
  deleteRecord(handle: RecordHandle): void;
  registerWriteHandler(path: string, handler: WriteHandler): void;
  registerCommandHandler(path: string, handler: CommandHandler): void;
  replyCommandResult(request: CommandRequest, status: CommandStatus): void;
}

// =============================================================================
// Resource Paths
// =============================================================================

export const VARIABLE_PATHS = {
  fanOn: "truck.var.fan.isOn",
  fanDuration: "truck.var.fan.duration",
  temperature: "truck.var.temp.current",
  doorOpen: "truck.var.door.isOpen",
  latitude: "truck.var.position.latitude",
  longitude: "truck.var.position.longitude",
  positionTimestamp: "truck.var.position.timestamp",
} as const;

export const SETTING_PATHS = {
  targetTemperature: "truck.set.temp.target",
  outsideTemperature: "truck.set.temp.outside",
  dataGenInterval: "truck.set.interval.datagen",
  dataPushInterval: "truck.set.interval.datapush",
  boardVariant: "truck.set.boardVariant",
} as const;

export const COMMAND_PATHS = {
  startFan: "truck.cmd.startFan",
  stopFan: "truck.cmd.stopFan",
  openDoor: "truck.cmd.openDoor",
  closeDoor: "truck.cmd.closeDoor",
} as const;

// =============================================================================
// Wire Formats
// =============================================================================

export const AssetValueSchema = z.union([z.boolean(), z.number(), z.string()]);

/**
 * Setting write payload. Topic: <root>/write/<path>
 * Accepts `{ "value": ... }` or a bare JSON scalar.
 */
export const WriteMessageSchema = z.union([
  z.object({ value: AssetValueSchema }),
  AssetValueSchema,
]);

export type WriteMessage = z.infer<typeof WriteMessageSchema>;

/**
 * Command invocation payload. Topic: <root>/command/<path>
 */
export const CommandMessageSchema = z.object({
  requestId: z.string().min(1).optional(),
});

export type CommandMessage = z.infer<typeof CommandMessageSchema>;

/**
 * A sample captured in a timeseries record.
 */
export type RecordedSample = Readonly<{
  path: string;
  value: number;
  timestamp: number;
}>;

/**
 * Inbound MQTT message classified by topic.
 */
export type InboundMessage =
  | { readonly type: "write"; readonly path: string }
  | { readonly type: "command"; readonly path: string }
  | { readonly type: "unknown" };
