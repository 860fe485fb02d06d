/**
 * Reefer Truck Simulator - Application Entry Point
 *
 * Opens the MQTT asset-data session, builds the simulated collaborators
 * (settings file, GPIO bank, position fix) and starts the truck.
 */
import { createTruckApp } from "./app/index.js";
import {
  createMqttAssetDataSink,
  openSession,
  releaseSession,
} from "./asset-data/index.js";
import { config, getAssetDataConfig, getPositionFix } from "./config.js";
import { createSimulatedGpio } from "./gpio/index.js";
import { createLogger } from "./logger.js";
import { createSimulatedPositionService } from "./position/index.js";
import { createJsonFileStorage } from "./storage/index.js";

const log = createLogger("app");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  REFRIGERATED TRUCK SIMULATOR");
console.log("========================================");
console.log("");

const assetDataConfig = getAssetDataConfig();
const positionFix = getPositionFix();

// Log configuration summary (non-sensitive values only)
log.info(
  {
    env: config.NODE_ENV,
    deviceId: config.DEVICE_ID,
    mqttBroker: assetDataConfig.brokerUrl,
    topicRoot: assetDataConfig.topicRoot,
    settingsFile: config.SETTINGS_FILE,
    maxRecordCount: config.TIMESERIES_MAX_RECORD,
    recordSampleCapacity: assetDataConfig.recordSampleCapacity,
    startTemperature: config.START_TEMPERATURE,
  },
  "Configuration loaded",
);

if (positionFix) {
  log.info(positionFix, "Position fix: ENABLED");
} else {
  log.info("Position fix: DISABLED");
}

console.log("");

// =============================================================================
// COLLABORATORS
// =============================================================================

const session = openSession({
  brokerUrl: assetDataConfig.brokerUrl,
  clientId: config.DEVICE_ID,
  username: assetDataConfig.username,
  password: assetDataConfig.password,
});

const sink = createMqttAssetDataSink(session, assetDataConfig);
const position = createSimulatedPositionService({ sink, coordinates: positionFix });

const app = createTruckApp({
  sink,
  storage: createJsonFileStorage(config.SETTINGS_FILE),
  gpio: createSimulatedGpio(),
  position,
  startTempC: config.START_TEMPERATURE,
  maxRecordCount: config.TIMESERIES_MAX_RECORD,
});

// =============================================================================
// START TRUCK
// =============================================================================

app.start();

log.info({ appName: config.APP_NAME }, `🚚 ${config.APP_NAME} running`);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  // Stop timers and position
  app.stop();

  // Close MQTT session
  releaseSession(session);

  log.info("Shutdown complete");
  process.exit(0);
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
