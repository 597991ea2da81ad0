/**
 * HTTP application: request tracing, error boundary and fleet routes.
 */
import { Hono } from "hono";

import type { Fleet } from "../fleet/index.js";
import { errorHandler, notFoundHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { createRoutes } from "./routes.js";

export function createApp(fleet: Fleet): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);
  app.notFound(notFoundHandler);
  app.route("/", createRoutes(fleet));

  return app;
}
