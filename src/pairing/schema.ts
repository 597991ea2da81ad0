/**
 * Pairing Module - Schemas and Types
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { DeviceType } from "../device/index.js";
import type { DiscoveredDevice, Discoverer } from "../discovery/index.js";
import type { HttpClient } from "../http/index.js";
import type { PairingError } from "./errors.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Client names accepted by the device's user endpoint.
 */
export const NAME_PATTERN = /^[a-zA-Z0-9\-_/\\# ]{1,40}$/;

export const PAIRING_DEFAULTS = {
  pollIntervalMs: 5000,
  maxAttempts: 36,
  deadlineMs: 180000,
} as const;

// =============================================================================
// Wire Schemas
// =============================================================================

export const TokenResponseSchema = z.object({
  token: z.string().min(1),
});

export type TokenRequest = Readonly<{
  name: string;
}>;

// =============================================================================
// Results
// =============================================================================

export type PairedDevice = Readonly<{
  host: string;
  token: string;
  type: DeviceType;
}>;

/**
 * A device to pair. Discovered devices qualify as-is.
 */
export type PairingTarget = Readonly<{
  host: string;
  type: DeviceType;
  instance?: string | undefined;
}>;

export type PairingStatusKind = "initializing" | "waiting" | "paired" | "failed";

/**
 * One row of the status board. Replaced as a whole on every change.
 */
export type PairingStatus = Readonly<{
  host: string;
  type: DeviceType;
  kind: PairingStatusKind;
  /** Human-readable status, e.g. "waiting for button press (attempt 3/36)..." */
  line: string;
  attempt: number;
  token: string | null;
  error: PairingError | null;
}>;

export type BatchResult = Readonly<{
  paired: ReadonlyArray<PairedDevice>;
  failedCount: number;
  statuses: ReadonlyArray<PairingStatus>;
}>;

// =============================================================================
// Options
// =============================================================================

export type PairingTiming = Readonly<{
  pollIntervalMs?: number | undefined;
  maxAttempts?: number | undefined;
  deadlineMs?: number | undefined;
}>;

export type PairDeviceOptions = PairingTiming &
  Readonly<{
    http: HttpClient;
    /** Called before each token request with the 1-based attempt number */
    onAttempt?: ((attempt: number) => void) | undefined;
    signal?: AbortSignal | undefined;
  }>;

export type BatchPairingOptions = PairingTiming &
  Readonly<{
    http: HttpClient;
    /** Called with the initial board before the first token request */
    onBatchStart?: ((statuses: ReadonlyArray<PairingStatus>) => void) | undefined;
    /** Called after every status change with the row index and the new row */
    onStatus?: ((index: number, status: PairingStatus) => void) | undefined;
  }>;

export type BatchPairingHandle = Readonly<{
  statuses: () => ReadonlyArray<PairingStatus>;
  /** Stop pairing one device; its siblings keep going */
  cancel: (host: string) => boolean;
  done: Promise<BatchResult>;
}>;

export type DiscoverAndPairOptions = BatchPairingOptions &
  Readonly<{
    discoverer: Discoverer;
    scanTimeoutMs: number;
    quietPeriodMs?: number | undefined;
    onFound?: ((device: DiscoveredDevice) => void) | undefined;
    /** Asked once discovery ends; false aborts without pairing */
    confirm: (devices: ReadonlyArray<DiscoveredDevice>) => Promise<boolean>;
  }>;

export type PairingOutcome = Result<BatchResult, PairingError>;
