/**
 * Device Module - Schemas and Types
 *
 * Measurement payloads as sent on the device stream (snake_case).
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { ConnectionError, LinkState, TransportFactory } from "../connection/index.js";
import type { Clock } from "../freshness/index.js";
import type { HttpClient } from "../http/index.js";
import type { DeviceError } from "./errors.js";

// =============================================================================
// Device Types
// =============================================================================

export const DEVICE_TYPES = ["p1meter", "kwhmeter", "battery"] as const;

export const DeviceTypeSchema = z.enum(DEVICE_TYPES);

export type DeviceType = z.infer<typeof DeviceTypeSchema>;

/**
 * Fixed specifications of the home battery.
 */
export const BATTERY_SPECS = {
  capacityKwh: 2.47,
  maxChargePowerW: 800,
  maxDischargePowerW: 800,
} as const;

// =============================================================================
// Measurements
// =============================================================================

const reading = (description: string) => z.number().default(0).describe(description);

/**
 * Fields shared by every meter. Absent fields read as 0.
 */
export const CommonMeasurementSchema = z.object({
  power_w: reading("Total active power (W)"),
  power_l1_w: reading("L1 active power (W), 3-phase only"),
  power_l2_w: reading("L2 active power (W), 3-phase only"),
  power_l3_w: reading("L3 active power (W), 3-phase only"),

  voltage_v: reading("Voltage (V), 1-phase or aggregate"),
  voltage_l1_v: reading("L1 voltage (V)"),
  voltage_l2_v: reading("L2 voltage (V)"),
  voltage_l3_v: reading("L3 voltage (V)"),

  current_a: reading("Total current (A)"),
  current_l1_a: reading("L1 current (A)"),
  current_l2_a: reading("L2 current (A)"),
  current_l3_a: reading("L3 current (A)"),
});

export type CommonMeasurement = Readonly<z.infer<typeof CommonMeasurementSchema>>;

/**
 * Grid meter: tariff-split energy totals.
 */
export const P1MeasurementSchema = CommonMeasurementSchema.extend({
  energy_import_t1_kwh: reading("Imported energy, tariff 1 (kWh)"),
  energy_import_t2_kwh: reading("Imported energy, tariff 2 (kWh)"),
  energy_export_t1_kwh: reading("Exported energy, tariff 1 (kWh)"),
  energy_export_t2_kwh: reading("Exported energy, tariff 2 (kWh)"),
});

export type P1Measurement = Readonly<z.infer<typeof P1MeasurementSchema>>;

/**
 * Energy meter: simple energy totals.
 */
export const KwhMeasurementSchema = CommonMeasurementSchema.extend({
  energy_import_kwh: reading("Imported energy (kWh)"),
  energy_export_kwh: reading("Exported energy (kWh)"),
});

export type KwhMeasurement = Readonly<z.infer<typeof KwhMeasurementSchema>>;

/**
 * Battery: energy totals plus charge state.
 */
export const BatteryMeasurementSchema = KwhMeasurementSchema.extend({
  state_of_charge_pct: reading("State of charge (%)"),
  cycles: z.number().int().default(0).describe("Full charge cycles"),
});

export type BatteryMeasurement = Readonly<z.infer<typeof BatteryMeasurementSchema>>;

// =============================================================================
// Battery Control (via grid meter)
// =============================================================================

export const BATTERY_MODES = ["zero", "to_full", "standby"] as const;

export const BatteryModeSchema = z.enum(BATTERY_MODES);

export type BatteryMode = z.infer<typeof BatteryModeSchema>;

/**
 * Group state of the batteries, from the `batteries` topic.
 */
export const BatteriesDataSchema = z.object({
  mode: z.string().describe("Active control mode"),
  power_w: reading("Combined battery power (W)"),
  target_power_w: reading("Requested battery power (W)"),
  max_consumption_w: reading("Maximum charge power (W)"),
  max_production_w: reading("Maximum discharge power (W)"),
});

export type BatteriesData = Readonly<z.infer<typeof BatteriesDataSchema>>;

/**
 * Response of `PUT /api/batteries`: echoes the applied mode.
 */
export const BatteryModeResponseSchema = z.object({
  mode: z.string(),
  power_w: z.number().optional(),
});

export type BatteryPowerLimits = Readonly<{
  maxChargeW: number;
  maxDischargeW: number;
}>;

export type BatteryModeOutcome = Readonly<{
  requestedMode: BatteryMode;
  /** Mode echoed by the device, null when sent over the stream */
  appliedMode: string | null;
  path: "stream" | "http";
  powerW: number | null;
}>;

// =============================================================================
// Capabilities
// =============================================================================

export type PhaseCount = 1 | 3;

/**
 * Per-phase values. 1-phase meters report [aggregate, 0, 0].
 */
export type PhaseValues = readonly [number, number, number];

export type MeterCapability<T extends CommonMeasurement> = Readonly<{
  getMeasurement: () => Result<T, DeviceError>;
  getPower: (invert?: boolean) => Result<number, DeviceError>;
  getPhasePowers: (
    phases: PhaseCount,
    invert?: boolean,
  ) => Result<PhaseValues, DeviceError>;
  getPhaseVoltages: (phases: PhaseCount) => Result<PhaseValues, DeviceError>;
  getPhaseCurrents: (phases: PhaseCount) => Result<PhaseValues, DeviceError>;
  lastUpdated: () => number | null;
}>;

export type BatteryControl = Readonly<{
  getState: () => Result<BatteriesData, DeviceError>;
  getPowerLimits: () => Result<BatteryPowerLimits, DeviceError>;
  setMode: (mode: BatteryMode) => Promise<Result<BatteryModeOutcome, DeviceError>>;
}>;

// =============================================================================
// Devices
// =============================================================================

export type DeviceOptions = Readonly<{
  host: string;
  token: string;
  /** Max age of cached telemetry */
  timeoutMs: number;
  reconnectDelayMs: number;
  /** Max time from opening a stream to a completed handshake */
  handshakeTimeoutMs?: number | undefined;
  /** Max silence on a connected stream before it is reopened */
  idleTimeoutMs?: number | undefined;
  http: HttpClient;
  transportFactory?: TransportFactory | undefined;
  now?: Clock | undefined;
}>;

type DeviceLifecycle = Readonly<{
  host: string;
  start: () => Promise<Result<void, ConnectionError>>;
  startAndWait: (timeoutMs: number) => Promise<Result<void, ConnectionError>>;
  stop: () => void;
  linkState: () => LinkState;
}>;

export type GridMeter = DeviceLifecycle &
  Readonly<{
    type: "p1meter";
    meter: MeterCapability<P1Measurement>;
    /** Imported energy, tariff 1 + tariff 2 (kWh) */
    getTotalEnergy: () => Result<number, DeviceError>;
    battery: BatteryControl;
  }>;

export type EnergyMeter = DeviceLifecycle &
  Readonly<{
    type: "kwhmeter";
    meter: MeterCapability<KwhMeasurement>;
    /** Export total when the meter measures production, import otherwise */
    getTotalEnergy: (usePvExport: boolean) => Result<number, DeviceError>;
    battery?: undefined;
  }>;

export type BatteryDevice = DeviceLifecycle &
  Readonly<{
    type: "battery";
    meter: MeterCapability<BatteryMeasurement>;
    getStateOfCharge: () => Result<number, DeviceError>;
    getCycleCount: () => Result<number, DeviceError>;
    getTotalEnergy: () => Result<
      Readonly<{ importKwh: number; exportKwh: number }>,
      DeviceError
    >;
    battery?: undefined;
  }> &
  typeof BATTERY_SPECS;

export type Device = GridMeter | EnergyMeter | BatteryDevice;
