/**
 * Typed configuration - all config lives in the environment, parsed with Zod at startup.
 * Process exits immediately on invalid config - fail fast.
 *
 * Every key has a default so the CLI runs without any .env file:
 * - Runtime settings
 * - Device streaming and freshness windows
 * - Button-press pairing budget
 * - Discovery scan windows
 */
import { z } from "zod";

const durationMs = (defaultValue: number, description: string) =>
  z.coerce.number().int().positive().default(defaultValue).describe(description);

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("meterlink").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),
  PORT: z.coerce.number().int().positive().default(8084).describe("HTTP API port"),

  // ==========================================================================
  // Devices
  // ==========================================================================
  DEVICE_TIMEOUT_MS: durationMs(
    30000,
    "Max age of cached telemetry before reads fail with a timeout",
  ),
  CONNECT_TIMEOUT_MS: durationMs(
    10000,
    "How long to wait for the initial stream handshake",
  ),
  RECONNECT_DELAY_MS: durationMs(
    5000,
    "Delay before re-opening a lost stream",
  ),
  LINK_IDLE_TIMEOUT_MS: durationMs(
    30000,
    "Reopen a connected stream after this long without a frame",
  ),
  HTTP_TIMEOUT_MS: durationMs(10000, "Per-request HTTP timeout"),
  METERS_FILE: z
    .string()
    .default("meters.json")
    .describe("JSON file listing the meters served by the API"),

  // ==========================================================================
  // Pairing
  // ==========================================================================
  PAIRING_POLL_INTERVAL_MS: durationMs(
    5000,
    "Interval between token requests while waiting for the button",
  ),
  PAIRING_MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .positive()
    .default(36)
    .describe("Token requests per device before giving up"),
  PAIRING_DEADLINE_MS: durationMs(
    180000,
    "Overall deadline for one pairing session",
  ),

  // ==========================================================================
  // Discovery
  // ==========================================================================
  DISCOVERY_TIMEOUT_MS: durationMs(30000, "Maximum scan window"),
  DISCOVERY_QUIET_PERIOD_MS: durationMs(
    3000,
    "Stop scanning after this long without a new device",
  ),
});

// Parse at startup - exits immediately if invalid
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
 * Settings shared by every device adapter.
 */
export function getDeviceConfig(): Readonly<{
  timeoutMs: number;
  connectTimeoutMs: number;
  reconnectDelayMs: number;
  idleTimeoutMs: number;
  httpTimeoutMs: number;
}> {
  return {
    timeoutMs: config.DEVICE_TIMEOUT_MS,
    connectTimeoutMs: config.CONNECT_TIMEOUT_MS,
    reconnectDelayMs: config.RECONNECT_DELAY_MS,
    idleTimeoutMs: config.LINK_IDLE_TIMEOUT_MS,
    httpTimeoutMs: config.HTTP_TIMEOUT_MS,
  };
}

/**
 * Button-press pairing budget.
 */
export function getPairingConfig(): Readonly<{
  pollIntervalMs: number;
  maxAttempts: number;
  deadlineMs: number;
}> {
  return {
    pollIntervalMs: config.PAIRING_POLL_INTERVAL_MS,
    maxAttempts: config.PAIRING_MAX_ATTEMPTS,
    deadlineMs: config.PAIRING_DEADLINE_MS,
  };
}

/**
 * Discovery scan windows.
 */
export function getDiscoveryConfig(): Readonly<{
  scanTimeoutMs: number;
  quietPeriodMs: number;
}> {
  return {
    scanTimeoutMs: config.DISCOVERY_TIMEOUT_MS,
    quietPeriodMs: config.DISCOVERY_QUIET_PERIOD_MS,
  };
}
