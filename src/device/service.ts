/**
 * Device Module - Service Layer
 *
 * Adapters for grid meters, energy meters and batteries. Each adapter owns
 * one streaming connection and the freshness caches it feeds. Accessors
 * never block: they read the latest cached telemetry or fail with TIMEOUT.
 */
import { type Result, err, ok } from "neverthrow";
import type { z } from "zod";

import {
  type MessageHandler,
  type StreamingConnection,
  createStreamingConnection,
  formatConnectionError,
} from "../connection/index.js";
import {
  type FreshnessCache,
  createFreshnessCache,
  formatFreshnessError,
} from "../freshness/index.js";
import { API_VERSION_HEADERS, type HttpClient, formatHttpError } from "../http/index.js";
import { createLogger, logOperationFailed } from "../logger.js";
import { type DeviceError, controlFailed, timedOut } from "./errors.js";
import {
  BATTERY_SPECS,
  type BatteriesData,
  BatteriesDataSchema,
  type BatteryControl,
  type BatteryDevice,
  type BatteryMeasurement,
  BatteryMeasurementSchema,
  type BatteryMode,
  BatteryModeResponseSchema,
  type BatteryModeOutcome,
  type CommonMeasurement,
  type Device,
  type DeviceOptions,
  type DeviceType,
  type EnergyMeter,
  type GridMeter,
  type KwhMeasurement,
  KwhMeasurementSchema,
  type MeterCapability,
  type P1Measurement,
  P1MeasurementSchema,
} from "./schema.js";
import {
  batteryModeMessage,
  buildBatteriesUrl,
  decodePayload,
  formatIssues,
  negate,
  selectPhaseCurrents,
  selectPhasePowers,
  selectPhaseVoltages,
  toPowerLimits,
  totalGridImport,
} from "./transform.js";

const log = createLogger("device");

// =============================================================================
// Message Routing
// =============================================================================

type Route = (payload: unknown) => Result<void, DeviceError>;

/**
 * Route that decodes a payload and stores it in a cache.
 */
function cacheRoute<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  messageType: string,
  cache: FreshnessCache<T>,
): Route {
  return (payload) =>
    decodePayload(schema, messageType, payload).map((value) => {
      cache.set(value);
    });
}

/**
 * Build the stream handler for one device from its per-type routes.
 * Informational `device` and `system` frames are expected and ignored.
 */
function createMessageRouter(
  host: string,
  routes: Readonly<Record<string, Route | undefined>>,
): MessageHandler {
  return (type, payload) => {
    const route = routes[type];
    if (route !== undefined) {
      return route(payload);
    }

    if (type === "device" || type === "system") {
      log.trace({ host, type }, "Ignoring informational message");
    } else {
      log.debug({ host, type }, "Ignoring unhandled message type");
    }
    return ok(undefined);
  };
}

function readFresh<T>(cache: FreshnessCache<T>): Result<T, DeviceError> {
  return cache.get().mapErr((error) => timedOut(formatFreshnessError(error)));
}

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Meter accessors over a measurement cache.
 */
export function createMeterCapability<T extends CommonMeasurement>(
  cache: FreshnessCache<T>,
): MeterCapability<T> {
  const getMeasurement = () => readFresh(cache);

  return {
    getMeasurement,
    getPower: (invert = false) =>
      getMeasurement().map((m) => (invert ? negate(m.power_w) : m.power_w)),
    getPhasePowers: (phases, invert = false) =>
      getMeasurement().map((m) => selectPhasePowers(m, phases, invert)),
    getPhaseVoltages: (phases) =>
      getMeasurement().map((m) => selectPhaseVoltages(m, phases)),
    getPhaseCurrents: (phases) =>
      getMeasurement().map((m) => selectPhaseCurrents(m, phases)),
    lastUpdated: () => cache.lastUpdated(),
  };
}

export type BatteryControlOptions = Readonly<{
  host: string;
  token: string;
  http: HttpClient;
  connection: Pick<StreamingConnection, "send">;
  cache: FreshnessCache<BatteriesData>;
}>;

/**
 * Battery group control through the grid meter.
 *
 * A mode change goes out on the stream first; when the stream cannot take
 * it, the same mode is PUT over HTTP. Both paths are authoritative, so the
 * device may see a mode twice and applies it idempotently.
 */
export function createBatteryControl(options: BatteryControlOptions): BatteryControl {
  const { host, token, http, connection, cache } = options;

  async function putMode(
    mode: BatteryMode,
  ): Promise<Result<BatteryModeOutcome, DeviceError>> {
    const response = await http.request({
      method: "PUT",
      url: buildBatteriesUrl(host),
      headers: { ...API_VERSION_HEADERS, Authorization: `Bearer ${token}` },
      body: { mode },
    });

    if (response.isErr()) {
      return err(controlFailed(mode, formatHttpError(response.error)));
    }

    const parsed = BatteryModeResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(
        controlFailed(mode, `Unexpected response: ${formatIssues(parsed.error)}`),
      );
    }

    const outcome: BatteryModeOutcome = {
      requestedMode: mode,
      appliedMode: parsed.data.mode,
      path: "http",
      powerW: parsed.data.power_w ?? null,
    };
    return ok(outcome);
  }

  return {
    getState: () => readFresh(cache),

    getPowerLimits: () => readFresh(cache).map(toPowerLimits),

    async setMode(mode) {
      const sent = connection.send(batteryModeMessage(mode));
      if (sent.isOk()) {
        log.info({ host, mode }, "Battery mode sent on stream");
        const outcome: BatteryModeOutcome = {
          requestedMode: mode,
          appliedMode: null,
          path: "stream",
          powerW: null,
        };
        return ok(outcome);
      }

      log.debug(
        { host, mode, reason: formatConnectionError(sent.error) },
        "Stream unavailable, setting battery mode over HTTP",
      );

      const result = await putMode(mode);
      if (result.isErr()) {
        logOperationFailed(log, "setBatteryMode", result.error.message, { host, mode });
        return result;
      }

      log.info({ host, mode, applied: result.value.appliedMode }, "Battery mode set over HTTP");
      return result;
    },
  };
}

// =============================================================================
// Devices
// =============================================================================

function lifecycle(connection: StreamingConnection) {
  return {
    host: connection.host,
    start: connection.start,
    startAndWait: connection.startAndWait,
    stop: connection.stop,
    linkState: connection.state,
  };
}

function connect(
  options: DeviceOptions,
  topics: ReadonlyArray<string>,
  routes: Readonly<Record<string, Route | undefined>>,
): StreamingConnection {
  return createStreamingConnection({
    host: options.host,
    token: options.token,
    topics,
    onMessage: createMessageRouter(options.host, routes),
    reconnectDelayMs: options.reconnectDelayMs,
    handshakeTimeoutMs: options.handshakeTimeoutMs,
    idleTimeoutMs: options.idleTimeoutMs,
    transportFactory: options.transportFactory,
  });
}

/**
 * Grid (P1) meter. Its power is already signed from the grid's
 * perspective and is never inverted.
 */
export function createGridMeter(options: DeviceOptions): GridMeter {
  const measurements = createFreshnessCache<P1Measurement>(options.timeoutMs, options.now);
  const batteries = createFreshnessCache<BatteriesData>(options.timeoutMs, options.now);

  const connection = connect(options, ["measurement", "batteries"], {
    measurement: cacheRoute(P1MeasurementSchema, "measurement", measurements),
    batteries: cacheRoute(BatteriesDataSchema, "batteries", batteries),
  });

  const meter = createMeterCapability(measurements);

  return {
    type: "p1meter",
    ...lifecycle(connection),
    meter: {
      ...meter,
      getPower: () => meter.getPower(false),
      getPhasePowers: (phases) => meter.getPhasePowers(phases, false),
    },
    getTotalEnergy: () => meter.getMeasurement().map(totalGridImport),
    battery: createBatteryControl({
      host: options.host,
      token: options.token,
      http: options.http,
      connection,
      cache: batteries,
    }),
  };
}

/**
 * Energy (kWh) meter, typically measuring solar production.
 */
export function createEnergyMeter(options: DeviceOptions): EnergyMeter {
  const measurements = createFreshnessCache<KwhMeasurement>(options.timeoutMs, options.now);

  const connection = connect(options, ["measurement"], {
    measurement: cacheRoute(KwhMeasurementSchema, "measurement", measurements),
  });

  const meter = createMeterCapability(measurements);

  return {
    type: "kwhmeter",
    ...lifecycle(connection),
    meter,
    getTotalEnergy: (usePvExport) =>
      meter
        .getMeasurement()
        .map((m) => (usePvExport ? m.energy_export_kwh : m.energy_import_kwh)),
  };
}

/**
 * Home battery. Mode control goes through the grid meter, not here.
 */
export function createBatteryDevice(options: DeviceOptions): BatteryDevice {
  const measurements = createFreshnessCache<BatteryMeasurement>(
    options.timeoutMs,
    options.now,
  );

  const connection = connect(options, ["measurement"], {
    measurement: cacheRoute(BatteryMeasurementSchema, "measurement", measurements),
  });

  const meter = createMeterCapability(measurements);

  return {
    type: "battery",
    ...lifecycle(connection),
    ...BATTERY_SPECS,
    meter,
    getStateOfCharge: () => meter.getMeasurement().map((m) => m.state_of_charge_pct),
    getCycleCount: () => meter.getMeasurement().map((m) => m.cycles),
    getTotalEnergy: () =>
      meter.getMeasurement().map((m) => ({
        importKwh: m.energy_import_kwh,
        exportKwh: m.energy_export_kwh,
      })),
  };
}

/**
 * Build the adapter for a device type.
 */
export function createDevice(type: DeviceType, options: DeviceOptions): Device {
  switch (type) {
    case "p1meter":
      return createGridMeter(options);
    case "kwhmeter":
      return createEnergyMeter(options);
    case "battery":
      return createBatteryDevice(options);
  }
}
