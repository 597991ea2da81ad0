/**
 * Pairing Module - Pure Transformations
 *
 * Name validation, request building and status-row transitions.
 */
import { type Result, err, ok } from "neverthrow";

import { type PairingError, invalidName } from "./errors.js";
import {
  NAME_PATTERN,
  type PairedDevice,
  type PairingStatus,
  type PairingTarget,
  type TokenRequest,
} from "./schema.js";

export function validateName(name: string): Result<string, PairingError> {
  return NAME_PATTERN.test(name) ? ok(name) : err(invalidName(name));
}

/**
 * Token requests carry the client name under the `local/` namespace.
 */
export function buildTokenRequest(name: string): TokenRequest {
  return { name: `local/${name}` };
}

export function buildUserUrl(host: string): string {
  return `https://${host}/api/user`;
}

// =============================================================================
// Status Rows
// =============================================================================

export function initialStatus(target: PairingTarget): PairingStatus {
  return {
    host: target.host,
    type: target.type,
    kind: "initializing",
    line: "initializing...",
    attempt: 0,
    token: null,
    error: null,
  };
}

export function waitingStatus(
  status: PairingStatus,
  attempt: number,
  maxAttempts: number,
): PairingStatus {
  return {
    ...status,
    kind: "waiting",
    line: `waiting for button press (attempt ${attempt}/${maxAttempts})...`,
    attempt,
  };
}

export function pairedStatus(status: PairingStatus, token: string): PairingStatus {
  return { ...status, kind: "paired", line: "✓ SUCCESS", token };
}

export function failedStatus(status: PairingStatus, error: PairingError): PairingStatus {
  return { ...status, kind: "failed", line: `✗ FAILED: ${error.message}`, error };
}

/**
 * Paired devices in board order.
 */
export function collectPaired(statuses: ReadonlyArray<PairingStatus>): PairedDevice[] {
  return statuses.flatMap((status) =>
    status.kind === "paired" && status.token !== null
      ? [{ host: status.host, token: status.token, type: status.type }]
      : [],
  );
}

export function countFailed(statuses: ReadonlyArray<PairingStatus>): number {
  return statuses.filter((status) => status.kind !== "paired").length;
}
