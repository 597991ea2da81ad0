/**
 * Fleet Module - Pure Transformations
 */
import { type Result, err, ok } from "neverthrow";

import type {
  BatteriesData,
  CommonMeasurement,
  Device,
  DeviceError,
} from "../device/index.js";
import { formatDeviceError, totalGridImport } from "../device/index.js";
import { type FleetError, invalidMetersFile } from "./errors.js";
import {
  type FleetReading,
  type MeterEntry,
  type MeterReading,
  MetersFileSchema,
} from "./schema.js";

// =============================================================================
// Meters File
// =============================================================================

/**
 * Parse and validate the contents of a meters file.
 */
export function parseMetersFile(
  path: string,
  raw: string,
): Result<ReadonlyArray<MeterEntry>, FleetError> {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return err(invalidMetersFile(path, "File is not valid JSON"));
  }

  const parsed = MetersFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return err(invalidMetersFile(path, issues));
  }

  return ok(parsed.data.meters);
}

// =============================================================================
// Readings
// =============================================================================

function commonReading(m: CommonMeasurement): Pick<MeterReading, "powerW" | "phases"> {
  return {
    powerW: m.power_w,
    phases: {
      powerW: [m.power_l1_w, m.power_l2_w, m.power_l3_w],
      voltageV: [m.voltage_l1_v, m.voltage_l2_v, m.voltage_l3_v],
      currentA: [m.current_l1_a, m.current_l2_a, m.current_l3_a],
    },
  };
}

function batteryGroup(data: BatteriesData): NonNullable<MeterReading["batteryGroup"]> {
  return {
    mode: data.mode,
    powerW: data.power_w,
    targetPowerW: data.target_power_w,
    maxChargeW: data.max_consumption_w,
    maxDischargeW: data.max_production_w,
  };
}

/**
 * Project a device's latest telemetry into a plain reading.
 * Fails with TIMEOUT when the measurement is stale.
 */
export function toReading(device: Device): Result<MeterReading, DeviceError> {
  switch (device.type) {
    case "p1meter":
      return device.meter.getMeasurement().map((m) => ({
        ...commonReading(m),
        energy: {
          importKwh: totalGridImport(m),
          exportKwh: m.energy_export_t1_kwh + m.energy_export_t2_kwh,
        },
        batteryGroup: device.battery.getState().match(batteryGroup, () => null),
      }));

    case "kwhmeter":
      return device.meter.getMeasurement().map((m) => ({
        ...commonReading(m),
        energy: { importKwh: m.energy_import_kwh, exportKwh: m.energy_export_kwh },
      }));

    case "battery":
      return device.meter.getMeasurement().map((m) => ({
        ...commonReading(m),
        energy: { importKwh: m.energy_import_kwh, exportKwh: m.energy_export_kwh },
        battery: { stateOfChargePct: m.state_of_charge_pct, cycles: m.cycles },
      }));
  }
}

/**
 * One fleet row: identity, link state and the reading or why there is none.
 */
export function toFleetReading(name: string, device: Device): FleetReading {
  const lastUpdated = device.meter.lastUpdated();
  const reading = toReading(device);

  return {
    name,
    type: device.type,
    host: device.host,
    linkState: device.linkState(),
    lastUpdated: lastUpdated === null ? null : new Date(lastUpdated).toISOString(),
    reading: reading.isOk() ? reading.value : null,
    error: reading.isErr() ? formatDeviceError(reading.error) : null,
  };
}
