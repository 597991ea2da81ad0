/**
 * Device Module - Public API
 */
export type {
  BatteriesData,
  BatteryControl,
  BatteryDevice,
  BatteryMeasurement,
  BatteryMode,
  BatteryModeOutcome,
  BatteryPowerLimits,
  CommonMeasurement,
  Device,
  DeviceOptions,
  DeviceType,
  EnergyMeter,
  GridMeter,
  KwhMeasurement,
  MeterCapability,
  P1Measurement,
  PhaseCount,
  PhaseValues,
} from "./schema.js";
export type { DeviceError } from "./errors.js";
export type { BatteryControlOptions } from "./service.js";

export {
  BATTERY_MODES,
  BATTERY_SPECS,
  BatteryModeSchema,
  DEVICE_TYPES,
  DeviceTypeSchema,
} from "./schema.js";
export { formatDeviceError } from "./errors.js";
export {
  createBatteryControl,
  createBatteryDevice,
  createDevice,
  createEnergyMeter,
  createGridMeter,
  createMeterCapability,
} from "./service.js";
export { totalGridImport, toPowerLimits } from "./transform.js";
