/**
 * Fleet Module - Schemas and Types
 *
 * The meters file lists the paired devices the API serves:
 * { "meters": [{ "name": "grid", "type": "p1meter", "host": "...", "token": "..." }] }
 */
import { z } from "zod";

import type { LinkState, TransportFactory } from "../connection/index.js";
import { type Device, DeviceTypeSchema, type PhaseValues } from "../device/index.js";
import type { Clock } from "../freshness/index.js";
import type { HttpClient } from "../http/index.js";

// =============================================================================
// Meters File
// =============================================================================

export const MeterEntrySchema = z.object({
  name: z.string().min(1).describe("Unique meter name used in API paths"),
  type: DeviceTypeSchema,
  host: z.string().min(1).describe("Device hostname or IP address"),
  token: z.string().min(1).describe("Token obtained by pairing"),
});

export type MeterEntry = z.infer<typeof MeterEntrySchema>;

export const MetersFileSchema = z
  .object({
    meters: z.array(MeterEntrySchema),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.meters.forEach((meter, index) => {
      if (seen.has(meter.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate meter name '${meter.name}'`,
          path: ["meters", index, "name"],
        });
      }
      seen.add(meter.name);
    });
  });

export type MetersFile = z.infer<typeof MetersFileSchema>;

// =============================================================================
// Readings
// =============================================================================

/**
 * Plain JSON projection of a device's latest telemetry.
 */
export type MeterReading = Readonly<{
  powerW: number;
  phases: Readonly<{
    powerW: PhaseValues;
    voltageV: PhaseValues;
    currentA: PhaseValues;
  }>;
  energy: Readonly<{
    importKwh: number;
    exportKwh: number;
  }>;
  /** Batteries only */
  battery?: Readonly<{
    stateOfChargePct: number;
    cycles: number;
  }>;
  /** Grid meters only; null until the batteries topic has reported */
  batteryGroup?: Readonly<{
    mode: string;
    powerW: number;
    targetPowerW: number;
    maxChargeW: number;
    maxDischargeW: number;
  }> | null;
}>;

export type FleetReading = Readonly<{
  name: string;
  type: Device["type"];
  host: string;
  linkState: LinkState;
  /** ISO time of the last measurement, null if none arrived yet */
  lastUpdated: string | null;
  reading: MeterReading | null;
  error: string | null;
}>;

// =============================================================================
// Fleet
// =============================================================================

export type FleetOptions = Readonly<{
  http: HttpClient;
  timeoutMs: number;
  reconnectDelayMs: number;
  handshakeTimeoutMs?: number | undefined;
  idleTimeoutMs?: number | undefined;
  transportFactory?: TransportFactory | undefined;
  now?: Clock | undefined;
}>;

export type StartSummary = Readonly<{
  connected: ReadonlyArray<string>;
  pending: ReadonlyArray<string>;
}>;

export type FleetMember = Readonly<{
  name: string;
  device: Device;
}>;

export type Fleet = Readonly<{
  names: () => ReadonlyArray<string>;
  get: (name: string) => Device | undefined;
  startAll: (timeoutMs: number) => Promise<StartSummary>;
  stopAll: () => void;
  readings: () => ReadonlyArray<FleetReading>;
  reading: (name: string) => FleetReading | undefined;
}>;
