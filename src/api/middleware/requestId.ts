/**
 * Request tracing. Each request carries an id in its logs, its JSON
 * bodies and the x-request-id response header.
 */
import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { z } from "zod";
import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

/**
 * Ids echoed from clients end up in logs, so only short token-like ones are kept.
 */
const IncomingRequestIdSchema = z.string().regex(/^[A-Za-z0-9._-]{1,128}$/);

export function resolveRequestId(header: string | undefined): string {
  const parsed = IncomingRequestIdSchema.safeParse(header);
  return parsed.success ? parsed.data : randomUUID();
}

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const requestId = resolveRequestId(c.req.header("x-request-id"));

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  const start = Date.now();
  await next();

  log.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    },
    `${c.req.method} ${c.req.path} → ${c.res.status}`,
  );
};

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
