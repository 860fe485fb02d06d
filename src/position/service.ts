/**
 * Position Module - Service Layer
 *
 * Simulated positioning: reports a fixed location from configuration and
 * publishes it as three asset-data variables.
 */
import {
  type AssetDataSink,
  VARIABLE_PATHS,
  logPushOutcome,
} from "../asset-data/index.js";
import { createLogger } from "../logger.js";
import type { Coordinates, PositionService } from "./schema.js";

const log = createLogger("position");

const POSITION_PATHS = [
  VARIABLE_PATHS.latitude,
  VARIABLE_PATHS.longitude,
  VARIABLE_PATHS.positionTimestamp,
] as const;

export function createSimulatedPositionService(options: {
  sink: AssetDataSink;
  coordinates: Coordinates | null;
  now?: () => number;
}): PositionService {
  const { sink, coordinates } = options;
  const now = options.now ?? Date.now;
  let running = false;

  return {
    start() {
      for (const path of POSITION_PATHS) {
        sink.createResource(path, "variable");
      }
      running = true;
      log.info({ fix: coordinates !== null }, "Position service started");
    },

    pushCurrentLocation() {
      if (!running || coordinates === null) {
        log.debug({ running }, "No position fix available");
        return "NO_FIX";
      }

      sink.setValue(VARIABLE_PATHS.latitude, coordinates.latitude);
      sink.setValue(VARIABLE_PATHS.longitude, coordinates.longitude);
      sink.setValue(VARIABLE_PATHS.positionTimestamp, now());

      for (const path of POSITION_PATHS) {
        logPushOutcome(log, path, sink.push(path));
      }

      return "FIX";
    },

    stop() {
      if (running) {
        running = false;
        log.info("Position service stopped");
      }
    },
  };
}
