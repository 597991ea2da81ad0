/**
 * Connection Module - Error Types
 *
 * Typed error unions for the device stream.
 * Errors are values, not exceptions.
 */
import type { LinkState } from "./schema.js";

export type ConnectionError =
  | {
      readonly type: "NOT_CONNECTED";
      readonly message: string;
      readonly state: LinkState;
    }
  | {
      readonly type: "LINK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "AUTH_REJECTED";
      readonly message: string;
    }
  | {
      readonly type: "DECODE_ERROR";
      readonly message: string;
      readonly raw: string;
    }
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "STOPPED";
      readonly message: string;
    };

export function notConnected(state: LinkState): ConnectionError {
  return {
    type: "NOT_CONNECTED",
    message: `Stream is ${state}`,
    state,
  };
}

export function linkError(message: string, cause?: Error): ConnectionError {
  if (cause) {
    return { type: "LINK_ERROR", message, cause };
  }
  return { type: "LINK_ERROR", message };
}

export function authRejected(message: string): ConnectionError {
  return { type: "AUTH_REJECTED", message };
}

export function decodeError(message: string, raw: string): ConnectionError {
  return { type: "DECODE_ERROR", message, raw };
}

export function connectTimeout(timeoutMs: number): ConnectionError {
  return {
    type: "TIMEOUT",
    message: `No handshake within ${timeoutMs}ms`,
    timeoutMs,
  };
}

export function stopped(): ConnectionError {
  return { type: "STOPPED", message: "Connection was stopped" };
}

/**
 * Format a ConnectionError for logging.
 */
export function formatConnectionError(error: ConnectionError): string {
  switch (error.type) {
    case "NOT_CONNECTED":
      return `Not connected: ${error.message}`;
    case "LINK_ERROR":
      return `Link error: ${error.message}`;
    case "AUTH_REJECTED":
      return `Authorization rejected: ${error.message}`;
    case "DECODE_ERROR":
      return `Decode error: ${error.message}`;
    case "TIMEOUT":
      return `Connection timeout: ${error.message}`;
    case "STOPPED":
      return error.message;
  }
}
