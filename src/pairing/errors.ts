/**
 * Pairing Module - Error Types
 *
 * Typed error unions for button-press pairing.
 * Errors are values, not exceptions.
 */

export type PairingError =
  | {
      readonly type: "INVALID_NAME";
      readonly message: string;
      readonly name: string;
    }
  | {
      /** The device is waiting for its button to be pressed */
      readonly type: "AUTHORIZATION_PENDING";
      readonly message: string;
    }
  | {
      readonly type: "PROTOCOL_ERROR";
      readonly message: string;
      readonly status: number | null;
    }
  | {
      readonly type: "REQUEST_FAILED";
      readonly message: string;
    }
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
      readonly attempts: number;
    }
  | {
      readonly type: "CANCELLED";
      readonly message: string;
    }
  | {
      readonly type: "NO_DEVICES";
      readonly message: string;
    }
  | {
      readonly type: "DISCOVERY_FAILED";
      readonly message: string;
    }
  | {
      readonly type: "ABORTED";
      readonly message: string;
    };

// =============================================================================
// Error Constructors
// =============================================================================

export function invalidName(name: string): PairingError {
  return {
    type: "INVALID_NAME",
    message:
      "Invalid name: must be 1-40 characters (a-z, A-Z, 0-9, -, _, \\, /, #, spaces)",
    name,
  };
}

export function authorizationPending(): PairingError {
  return { type: "AUTHORIZATION_PENDING", message: "Waiting for button press" };
}

export function protocolError(message: string, status: number | null = null): PairingError {
  return { type: "PROTOCOL_ERROR", message, status };
}

export function requestFailed(message: string): PairingError {
  return { type: "REQUEST_FAILED", message };
}

export function pairingTimeout(attempts: number, deadlineMs: number): PairingError {
  return {
    type: "TIMEOUT",
    message: `No button press after ${attempts} attempts (${Math.round(deadlineMs / 1000)}s window)`,
    attempts,
  };
}

export function cancelled(): PairingError {
  return { type: "CANCELLED", message: "Pairing was cancelled" };
}

export function noDevices(): PairingError {
  return { type: "NO_DEVICES", message: "No devices found on the network" };
}

export function discoveryFailed(message: string): PairingError {
  return { type: "DISCOVERY_FAILED", message };
}

export function aborted(): PairingError {
  return { type: "ABORTED", message: "Discovery aborted by user" };
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format a PairingError for logging or display.
 */
export function formatPairingError(error: PairingError): string {
  switch (error.type) {
    case "INVALID_NAME":
      return error.message;
    case "AUTHORIZATION_PENDING":
      return error.message;
    case "PROTOCOL_ERROR":
      return `Protocol error: ${error.message}`;
    case "REQUEST_FAILED":
      return `Request failed: ${error.message}`;
    case "TIMEOUT":
      return `Timeout: ${error.message}`;
    case "CANCELLED":
      return error.message;
    case "NO_DEVICES":
      return error.message;
    case "DISCOVERY_FAILED":
      return `Discovery failed: ${error.message}`;
    case "ABORTED":
      return error.message;
  }
}
