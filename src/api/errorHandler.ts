/**
 * API error boundary. Every error leaves as `{ error, requestId }` JSON.
 */
import type { ErrorHandler, NotFoundHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

/**
 * HTTPExceptions keep their status and message. Anything else is a 500,
 * with the message hidden in production.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  if (err instanceof HTTPException) {
    log.warn(
      { requestId, status: err.status, error: err.message, path: c.req.path },
      "Request rejected",
    );
    return c.json({ error: err.message, requestId }, err.status);
  }

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "❌ Unhandled error",
  );

  const message =
    config.NODE_ENV === "production" ? "Internal server error" : err.message;

  return c.json({ error: message, requestId }, 500);
};

export const notFoundHandler: NotFoundHandler = (c) => {
  const requestId = c.get("requestId") ?? "unknown";
  return c.json({ error: `No route for ${c.req.method} ${c.req.path}`, requestId }, 404);
};
