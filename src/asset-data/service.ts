/**
 * Asset-Data Module - Service Layer
 *
 * MQTT-backed asset-data sink. Keeps the local value store for every
 * resource, publishes pushes and timeseries records, and routes inbound
 * setting writes and command invocations to registered handlers.
 *
 * Pushes resolve to a Result once the broker acknowledges (QoS 1) and never
 * reject; callers decide whether to observe the outcome.
 */
import { connect, type IClientPublishOptions, type MqttClient } from "mqtt";
import { type Result, err, ok } from "neverthrow";
import type { Logger } from "pino";

import { createLogger } from "../logger.js";
import type { AssetDataError } from "./errors.js";
import {
  formatAssetDataError,
  pushFailed,
  recordUnknown,
  resourceUnknown,
} from "./errors.js";
import type {
  AssetDataSink,
  AssetValue,
  CommandHandler,
  CommandRequest,
  CommandStatus,
  RecordHandle,
  RecordStatus,
  RecordedSample,
  ResourceKind,
  WriteHandler,
} from "./schema.js";
import {
  classifyTopic,
  commandResultTopic,
  commandTopic,
  dataTopic,
  encodeCommandResult,
  encodeRecord,
  encodeValue,
  parseCommandRequest,
  parseWriteValue,
  timeseriesTopic,
  writeTopic,
} from "./transform.js";

const log = createLogger("asset-data");

/**
 * The slice of the MQTT client the sink relies on.
 */
export interface MqttTransport {
  publish(
    topic: string,
    message: string,
    opts: IClientPublishOptions,
    callback: (error?: Error) => void,
  ): unknown;
  subscribe(
    topic: string,
    opts: { qos: 0 | 1 | 2 },
    callback: (error: Error | null) => void,
  ): unknown;
  on(event: "message", listener: (topic: string, payload: Buffer) => void): unknown;
}

export type AssetDataSinkOptions = Readonly<{
  topicRoot: string;
  recordSampleCapacity: number;
  now?: () => number;
}>;

const PUBLISH_OPTIONS: IClientPublishOptions = { qos: 1 };

// =============================================================================
// Session
// =============================================================================

/**
 * Open the MQTT session with the device-management server.
 */
export function openSession(options: {
  brokerUrl: string;
  clientId: string;
  username?: string | undefined;
  password?: string | undefined;
}): MqttClient {
  log.info({ broker: options.brokerUrl }, "Connecting to MQTT broker...");

  const client = connect(options.brokerUrl, {
    clientId: options.clientId,
    username: options.username,
    password: options.password,
    reconnectPeriod: 5000, // Reconnect every 5 seconds
    connectTimeout: 10000, // 10 second connection timeout
  });

  client.on("connect", () => {
    log.info("Connected to MQTT broker");
  });

  client.on("error", (error) => {
    log.error({ error: error.message }, "MQTT client error");
  });

  client.on("close", () => {
    log.warn("MQTT connection closed");
  });

  client.on("reconnect", () => {
    log.info("Reconnecting to MQTT broker...");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });

  return client;
}

/**
 * Release the session. In-flight pushes are abandoned.
 */
export function releaseSession(client: MqttClient): void {
  log.info("Releasing MQTT session...");
  client.end(true);
}

// =============================================================================
// Push Observation
// =============================================================================

/**
 * Observe a fire-and-forget push: log the outcome, never retry.
 */
export function logPushOutcome(
  logger: Logger,
  path: string,
  pending: Promise<Result<void, AssetDataError>>,
): void {
  void pending.then(
    (result) => {
      if (result.isErr()) {
        logger.warn({ path }, formatAssetDataError(result.error));
      } else {
        logger.debug({ path }, "Push OK & ACKed");
      }
    },
    (error: unknown) => {
      logger.error({ path, error: String(error) }, "Push rejected unexpectedly");
    },
  );
}

// =============================================================================
// Sink
// =============================================================================

/**
 * Create an asset-data sink on top of an MQTT transport.
 */
export function createMqttAssetDataSink(
  transport: MqttTransport,
  options: AssetDataSinkOptions,
): AssetDataSink {
  const root = options.topicRoot;
  const now = options.now ?? Date.now;

  const resources = new Map<string, ResourceKind>();
  const values = new Map<string, AssetValue>();
  const records = new Map<number, RecordedSample[]>();
  const writeHandlers = new Map<string, WriteHandler>();
  const commandHandlers = new Map<string, CommandHandler>();
  let nextRecordId = 1;

  const publish = (
    topic: string,
    message: string,
    path: string,
  ): Promise<Result<void, AssetDataError>> =>
    new Promise((resolve) => {
      try {
        transport.publish(topic, message, PUBLISH_OPTIONS, (error) => {
          if (error) {
            resolve(err(pushFailed(path, error.message, error)));
          } else {
            resolve(ok(undefined));
          }
        });
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        resolve(err(pushFailed(path, cause.message, cause)));
      }
    });

  const subscribe = (topic: string): void => {
    transport.subscribe(topic, { qos: 1 }, (error) => {
      if (error) {
        log.error({ topic, error: error.message }, "Failed to subscribe to topic");
      } else {
        log.debug({ topic }, "Subscribed to topic");
      }
    });
  };

  const handleWrite = (path: string, payload: Buffer): void => {
    const handler = writeHandlers.get(path);
    if (!handler) {
      log.debug({ path }, "Write to unregistered resource ignored");
      return;
    }

    const value = parseWriteValue(payload);
    if (value === null) {
      log.warn(
        { path, payload: payload.toString() },
        "Malformed setting write payload",
      );
      return;
    }

    values.set(path, value);
    handler(path);
  };

  const handleCommand = (path: string, payload: Buffer): void => {
    const handler = commandHandlers.get(path);
    if (!handler) {
      log.debug({ path }, "Command on unregistered resource ignored");
      return;
    }

    const request = parseCommandRequest(path, payload, now());
    if (!request) {
      log.warn(
        { path, payload: payload.toString() },
        "Malformed command payload",
      );
      return;
    }

    handler(path, request);
  };

  transport.on("message", (topic, payload) => {
    const message = classifyTopic(root, topic);

    switch (message.type) {
      case "write":
        handleWrite(message.path, payload);
        break;
      case "command":
        handleCommand(message.path, payload);
        break;
      case "unknown":
        log.debug({ topic }, "Unknown message type");
        break;
    }
  });

  return {
    createResource(path, kind) {
      resources.set(path, kind);
      log.debug({ path, kind }, "Resource created");
    },

    setValue(path, value) {
      values.set(path, value);
    },

    getValue(path) {
      return values.get(path);
    },

    push(path) {
      const value = values.get(path);
      if (!resources.has(path) || value === undefined) {
        return Promise.resolve(err(resourceUnknown(path)));
      }
      return publish(dataTopic(root, path), encodeValue(value, now()), path);
    },

    createRecord() {
      const id = nextRecordId++;
      records.set(id, []);
      return { id };
    },

    recordSample(handle, path, value, timestampMs): RecordStatus {
      const samples = records.get(handle.id);
      if (!samples) {
        return "error";
      }
      if (samples.length >= options.recordSampleCapacity) {
        return "full";
      }
      samples.push({ path, value, timestamp: timestampMs });
      return "ok";
    },

    pushRecord(handle: RecordHandle) {
      const samples = records.get(handle.id);
      if (!samples) {
        return Promise.resolve(err(recordUnknown(handle.id)));
      }
      // Encoded now so the record can be deleted before the ack arrives
      const message = encodeRecord(samples);
      return publish(timeseriesTopic(root), message, "timeseries");
    },

    deleteRecord(handle) {
      records.delete(handle.id);
    },

    registerWriteHandler(path, handler) {
      writeHandlers.set(path, handler);
      subscribe(writeTopic(root, path));
    },

    registerCommandHandler(path, handler) {
      commandHandlers.set(path, handler);
      subscribe(commandTopic(root, path));
    },

    replyCommandResult(request: CommandRequest, status: CommandStatus) {
      const topic = commandResultTopic(root, request.path);
      transport.publish(
        topic,
        encodeCommandResult(request, status),
        PUBLISH_OPTIONS,
        (error) => {
          if (error) {
            log.warn(
              { path: request.path, error: error.message },
              "Failed to deliver command result",
            );
          }
        },
      );
    },
  };
}
