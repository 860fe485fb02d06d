/**
 * Asset-Data Module - Pure Transformations
 *
 * Topic layout and payload encoding for the MQTT asset-data channel.
 * No side effects, no I/O - just data in, data out.
 */
import type {
  AssetValue,
  CommandRequest,
  CommandStatus,
  InboundMessage,
  RecordedSample,
} from "./schema.js";
import { CommandMessageSchema, WriteMessageSchema } from "./schema.js";

// =============================================================================
// Topics
// =============================================================================

export const dataTopic = (root: string, path: string): string =>
  `${root}/data/${path}`;

export const writeTopic = (root: string, path: string): string =>
  `${root}/write/${path}`;

export const commandTopic = (root: string, path: string): string =>
  `${root}/command/${path}`;

export const commandResultTopic = (root: string, path: string): string =>
  `${root}/command-result/${path}`;

export const timeseriesTopic = (root: string): string => `${root}/timeseries`;

/**
 * Classify an inbound topic as a setting write or a command invocation.
 * Resource paths never contain "/", so the remainder must be a single level.
 */
export function classifyTopic(root: string, topic: string): InboundMessage {
  const prefix = `${root}/`;
  if (!topic.startsWith(prefix)) {
    return { type: "unknown" };
  }

  const [channel, path, ...rest] = topic.slice(prefix.length).split("/");
  if (!path || rest.length > 0) {
    return { type: "unknown" };
  }

  switch (channel) {
    case "write":
      return { type: "write", path };
    case "command":
      return { type: "command", path };
    default:
      return { type: "unknown" };
  }
}

// =============================================================================
// Inbound Payloads
// =============================================================================

/**
 * Parse a Buffer or string payload as JSON.
 *
 * @returns Parsed value, or undefined when the payload is not valid JSON
 */
export function parseJsonPayload(payload: unknown): unknown {
  const text =
    payload instanceof Buffer
      ? payload.toString("utf8")
      : typeof payload === "string"
        ? payload
        : null;
  if (text === null) return undefined;

  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Extract the written value from a setting write payload.
 *
 * @returns The scalar value or null if the payload is malformed
 */
export function parseWriteValue(payload: unknown): AssetValue | null {
  const parsed = WriteMessageSchema.safeParse(parseJsonPayload(payload));
  if (!parsed.success) return null;

  const msg = parsed.data;
  return typeof msg === "object" ? msg.value : msg;
}

/**
 * Build a command request from an invocation payload.
 * An empty payload is a valid invocation without a request id.
 */
export function parseCommandRequest(
  path: string,
  payload: unknown,
  now: number,
): CommandRequest | null {
  const raw = payload instanceof Buffer ? payload.toString("utf8") : payload;
  if (raw === "" || raw === undefined) {
    return { path, requestId: null, receivedAt: now };
  }

  const parsed = CommandMessageSchema.safeParse(parseJsonPayload(raw));
  if (!parsed.success) return null;

  return { path, requestId: parsed.data.requestId ?? null, receivedAt: now };
}

// =============================================================================
// Outbound Payloads
// =============================================================================

export function encodeValue(value: AssetValue, timestamp: number): string {
  return JSON.stringify({ value, timestamp });
}

export function encodeRecord(samples: ReadonlyArray<RecordedSample>): string {
  return JSON.stringify({ samples });
}

export function encodeCommandResult(
  request: CommandRequest,
  status: CommandStatus,
): string {
  return JSON.stringify({ requestId: request.requestId, status });
}
