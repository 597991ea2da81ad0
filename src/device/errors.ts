/**
 * Device Module - Error Types
 *
 * Typed error unions for device adapters.
 * Errors are values, not exceptions.
 */

export type DeviceError =
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
    }
  | {
      readonly type: "DECODE_FAILED";
      readonly message: string;
      readonly messageType: string;
      readonly issues: string;
    }
  | {
      readonly type: "CONTROL_FAILED";
      readonly message: string;
      readonly mode: string;
    };

/**
 * Create a TIMEOUT error. Raised whenever the cached telemetry is stale.
 */
export function timedOut(message: string): DeviceError {
  return { type: "TIMEOUT", message };
}

/**
 * Create a DECODE_FAILED error for a payload that does not match its schema.
 */
export function decodeFailed(messageType: string, issues: string): DeviceError {
  return {
    type: "DECODE_FAILED",
    message: `Cannot decode ${messageType} payload`,
    messageType,
    issues,
  };
}

/**
 * Create a CONTROL_FAILED error.
 */
export function controlFailed(mode: string, message: string): DeviceError {
  return { type: "CONTROL_FAILED", message, mode };
}

/**
 * Format a DeviceError for logging.
 */
export function formatDeviceError(error: DeviceError): string {
  switch (error.type) {
    case "TIMEOUT":
      return `Timeout: ${error.message}`;
    case "DECODE_FAILED":
      return `${error.message}: ${error.issues}`;
    case "CONTROL_FAILED":
      return `Battery mode '${error.mode}' failed: ${error.message}`;
  }
}
