/**
 * Typed configuration - all config lives in the environment, parsed with Zod
 * at startup. The process exits immediately on invalid config.
 *
 * Covers:
 * - Runtime and logging
 * - MQTT asset-data session
 * - Settings persistence
 * - Simulation defaults (start temperature, record sizes, position fix)
 */
import { z } from "zod";

/**
 * Parse an optional number - empty string becomes undefined.
 */
const optionalNumber = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? Number(val) : undefined))
  .pipe(z.number().finite().optional());

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("ReeferTruck").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // MQTT Asset-Data Session
  // ==========================================================================
  MQTT_BROKER_URL: z
    .string()
    .min(1, "MQTT_BROKER_URL is required")
    .describe("MQTT broker connection URL"),
  MQTT_USERNAME: z.string().optional().describe("MQTT username"),
  MQTT_PASSWORD: z.string().optional().describe("MQTT password"),
  DEVICE_ID: z
    .string()
    .min(1)
    .regex(/^[^/#+]+$/, "DEVICE_ID must not contain MQTT topic characters")
    .default("truck-01")
    .describe("Device identifier, used as a topic segment"),
  MQTT_TOPIC_PREFIX: z
    .string()
    .min(1)
    .default("fleet")
    .describe("Root topic for all asset-data traffic"),
  RECORD_SAMPLE_CAPACITY: z.coerce
    .number()
    .int()
    .positive()
    .default(100)
    .describe("Samples a single timeseries record can hold before reporting full"),

  // ==========================================================================
  // Persistence
  // ==========================================================================
  SETTINGS_FILE: z
    .string()
    .min(1)
    .default("./data/settings.json")
    .describe("JSON file holding persisted truck settings"),

  // ==========================================================================
  // Simulation
  // ==========================================================================
  TIMESERIES_MAX_RECORD: z.coerce
    .number()
    .int()
    .positive()
    .default(6)
    .describe("Accumulations per timeseries record before it is pushed"),
  START_TEMPERATURE: z.coerce
    .number()
    .default(5.2)
    .describe("Initial simulated cargo temperature (°C)"),
  TRUCK_LATITUDE: optionalNumber.describe("Simulated latitude of the truck"),
  TRUCK_LONGITUDE: optionalNumber.describe("Simulated longitude of the truck"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * MQTT session configuration for the asset-data sink.
 */
export function getAssetDataConfig(): Readonly<{
  brokerUrl: string;
  username: string | undefined;
  password: string | undefined;
  topicRoot: string;
  recordSampleCapacity: number;
}> {
  return {
    brokerUrl: config.MQTT_BROKER_URL,
    username: config.MQTT_USERNAME,
    password: config.MQTT_PASSWORD,
    topicRoot: `${config.MQTT_TOPIC_PREFIX}/${config.DEVICE_ID}`,
    recordSampleCapacity: config.RECORD_SAMPLE_CAPACITY,
  };
}

/**
 * Simulated position fix. Returns null unless both coordinates are set.
 */
export function getPositionFix(): Readonly<{
  latitude: number;
  longitude: number;
}> | null {
  if (
    config.TRUCK_LATITUDE === undefined ||
    config.TRUCK_LONGITUDE === undefined
  ) {
    return null;
  }

  return {
    latitude: config.TRUCK_LATITUDE,
    longitude: config.TRUCK_LONGITUDE,
  };
}
