/**
 * Module-scoped color-coded loggers.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs. Logs go to stderr so
 * that CLI output on stdout stays machine-readable.
 */
import pino from "pino";
import { config } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Core modules
  connection: "\x1b[36m", // cyan
  device: "\x1b[35m", // magenta
  pairing: "\x1b[33m", // yellow

  // Collaborators
  http: "\x1b[91m", // bright red
  discovery: "\x1b[32m", // green
  fleet: "\x1b[95m", // bright magenta

  // Surfaces
  api: "\x1b[34m", // blue
  middleware: "\x1b[94m", // bright blue
  cli: "\x1b[90m", // gray
} as const;

const RESET = "\x1b[0m";

/**
 * Bearer tokens never reach the log output.
 */
const REDACT_PATHS = ["token", "*.token", "headers.Authorization"];

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger("connection");
 * log.info({ host }, "Stream connected");
 */
export function createLogger(module: ModuleName): pino.Logger {
  const color = MODULE_COLORS[module];

  if (config.NODE_ENV === "development") {
    return pino({
      name: module,
      level: config.LOG_LEVEL,
      redact: REDACT_PATHS,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON for production
  return pino(
    {
      name: module,
      level: config.LOG_LEVEL,
      redact: REDACT_PATHS,
    },
    pino.destination(2),
  );
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.info({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: pino.Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * Log operation failure with error details.
 */
export function logOperationFailed(
  logger: pino.Logger,
  operation: string,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(
    { operation, error: errorMessage, ...context },
    `✗ ${operation} failed: ${errorMessage}`,
  );
}
