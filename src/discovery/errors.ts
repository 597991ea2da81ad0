/**
 * Discovery Module - Error Types
 */

export type DiscoveryError = {
  readonly type: "SCAN_FAILED";
  readonly message: string;
  readonly cause?: Error;
};

export function scanFailed(message: string, cause?: Error): DiscoveryError {
  if (cause) {
    return { type: "SCAN_FAILED", message, cause };
  }
  return { type: "SCAN_FAILED", message };
}

export function formatDiscoveryError(error: DiscoveryError): string {
  return error.cause
    ? `Scan failed: ${error.message} (${error.cause.message})`
    : `Scan failed: ${error.message}`;
}
