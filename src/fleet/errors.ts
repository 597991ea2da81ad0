/**
 * Fleet Module - Error Types
 */

export type FleetError =
  | {
      readonly type: "INVALID_METERS_FILE";
      readonly message: string;
      readonly path: string;
    }
  | {
      readonly type: "READ_FAILED";
      readonly message: string;
      readonly path: string;
      readonly cause?: Error;
    };

export function invalidMetersFile(path: string, message: string): FleetError {
  return { type: "INVALID_METERS_FILE", message, path };
}

export function readFailed(path: string, cause?: Error): FleetError {
  const message = `Cannot read ${path}`;
  if (cause) {
    return { type: "READ_FAILED", message, path, cause };
  }
  return { type: "READ_FAILED", message, path };
}

export function formatFleetError(error: FleetError): string {
  switch (error.type) {
    case "INVALID_METERS_FILE":
      return `Invalid meters file ${error.path}: ${error.message}`;
    case "READ_FAILED":
      return error.cause ? `${error.message}: ${error.cause.message}` : error.message;
  }
}
