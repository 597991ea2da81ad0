/**
 * Device Module - Pure Transformations
 *
 * Payload decoding and measurement projections.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";
import type { z } from "zod";

import type { Envelope } from "../connection/index.js";
import { type DeviceError, decodeFailed } from "./errors.js";
import type {
  BatteriesData,
  BatteryMode,
  BatteryPowerLimits,
  CommonMeasurement,
  P1Measurement,
  PhaseCount,
  PhaseValues,
} from "./schema.js";

// =============================================================================
// Decoding
// =============================================================================

/**
 * Flatten zod issues into one line: `path: message; path: message`.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length === 0
        ? issue.message
        : `${issue.path.join(".")}: ${issue.message}`,
    )
    .join("; ");
}

/**
 * Decode a stream payload with the schema registered for its message type.
 */
export function decodePayload<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  messageType: string,
  payload: unknown,
): Result<T, DeviceError> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    return err(decodeFailed(messageType, formatIssues(parsed.error)));
  }
  return ok(parsed.data);
}

// =============================================================================
// Phase Projections
// =============================================================================

/**
 * Sign flip that never yields -0.
 */
export function negate(value: number): number {
  return value === 0 ? 0 : -value;
}

/**
 * 1-phase meters report the aggregate on L1; 3-phase meters report L1..L3.
 */
export function phaseValues(
  phases: PhaseCount,
  aggregate: number,
  perPhase: PhaseValues,
): PhaseValues {
  return phases === 1 ? [aggregate, 0, 0] : perPhase;
}

export function selectPhasePowers(
  m: CommonMeasurement,
  phases: PhaseCount,
  invert: boolean,
): PhaseValues {
  const [l1, l2, l3] = phaseValues(phases, m.power_w, [
    m.power_l1_w,
    m.power_l2_w,
    m.power_l3_w,
  ]);
  return invert ? [negate(l1), negate(l2), negate(l3)] : [l1, l2, l3];
}

export function selectPhaseVoltages(
  m: CommonMeasurement,
  phases: PhaseCount,
): PhaseValues {
  return phaseValues(phases, m.voltage_v, [
    m.voltage_l1_v,
    m.voltage_l2_v,
    m.voltage_l3_v,
  ]);
}

export function selectPhaseCurrents(
  m: CommonMeasurement,
  phases: PhaseCount,
): PhaseValues {
  return phaseValues(phases, m.current_a, [
    m.current_l1_a,
    m.current_l2_a,
    m.current_l3_a,
  ]);
}

// =============================================================================
// Energy & Battery
// =============================================================================

/**
 * Grid import across both tariffs (kWh).
 */
export function totalGridImport(m: P1Measurement): number {
  return m.energy_import_t1_kwh + m.energy_import_t2_kwh;
}

/**
 * Charge limit is what the batteries may consume, discharge what they may produce.
 */
export function toPowerLimits(data: BatteriesData): BatteryPowerLimits {
  return {
    maxChargeW: data.max_consumption_w,
    maxDischargeW: data.max_production_w,
  };
}

/**
 * In-band mode change, sent on the grid meter's stream.
 */
export function batteryModeMessage(mode: BatteryMode): Envelope {
  return { type: "batteries", data: { mode } };
}

export function buildBatteriesUrl(host: string): string {
  return `https://${host}/api/batteries`;
}
