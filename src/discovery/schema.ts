/**
 * Discovery Module - Schemas and Types
 */
import { z } from "zod";

import type { DeviceType } from "../device/index.js";

/**
 * Identification payload served by `GET /api` on every device (no auth).
 */
export const DeviceInfoSchema = z.object({
  product_name: z.string(),
  product_type: z.string(),
  serial: z.string(),
  firmware_version: z.string().optional(),
  api_version: z.string().optional(),
});

export type DeviceInfo = z.infer<typeof DeviceInfoSchema>;

/**
 * A device found on the network, ready to be paired.
 */
export type DiscoveredDevice = Readonly<{
  host: string;
  /** Human-readable name: "<product name> <serial>" */
  instance: string;
  type: DeviceType;
  productType: string;
}>;

/**
 * A source of devices. Reports each arrival through onFound and returns
 * once the signal aborts or it has nothing more to report.
 */
export type Discoverer = (
  signal: AbortSignal,
  onFound: (device: DiscoveredDevice) => void,
) => Promise<void>;

export type CollectOptions = Readonly<{
  /** Upper bound on the whole scan */
  scanTimeoutMs: number;
  /** Stop after this long without a new device */
  quietPeriodMs?: number | undefined;
  onFound?: ((device: DiscoveredDevice) => void) | undefined;
}>;

export const DEFAULT_QUIET_PERIOD_MS = 3000;
