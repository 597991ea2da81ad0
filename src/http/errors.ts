/**
 * HTTP Module - Error Types
 *
 * Typed error unions for JSON request/response calls.
 * Errors are values, not exceptions.
 */

export type HttpError =
  | {
      readonly type: "HTTP_STATUS";
      readonly message: string;
      readonly status: number;
      readonly body: string;
    }
  | {
      readonly type: "NETWORK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "ABORTED";
      readonly message: string;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly message: string;
      readonly body: string;
    };

/**
 * Create an HTTP_STATUS error for a non-2xx response.
 */
export function httpStatus(status: number, body: string): HttpError {
  return { type: "HTTP_STATUS", message: `HTTP ${status}: ${body}`, status, body };
}

/**
 * Create a NETWORK_ERROR.
 */
export function networkError(message: string, cause?: Error): HttpError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

/**
 * Create a TIMEOUT error.
 */
export function timeout(timeoutMs: number): HttpError {
  return {
    type: "TIMEOUT",
    message: `Request timed out after ${timeoutMs}ms`,
    timeoutMs,
  };
}

/**
 * Create an ABORTED error (caller cancelled the request).
 */
export function aborted(): HttpError {
  return { type: "ABORTED", message: "Request was cancelled" };
}

/**
 * Create an INVALID_RESPONSE error.
 */
export function invalidResponse(message: string, body: string): HttpError {
  return { type: "INVALID_RESPONSE", message, body };
}

/**
 * True when the error is a response with the given status code.
 */
export function hasStatus(error: HttpError, status: number): boolean {
  return error.type === "HTTP_STATUS" && error.status === status;
}

/**
 * Format an HttpError for logging.
 */
export function formatHttpError(error: HttpError): string {
  switch (error.type) {
    case "HTTP_STATUS":
      return error.message;
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "TIMEOUT":
      return error.message;
    case "ABORTED":
      return error.message;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
  }
}
