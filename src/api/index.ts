/**
 * API Module - Public API
 */
export { createApp } from "./app.js";
export { createRoutes } from "./routes.js";
export { errorHandler, notFoundHandler } from "./errorHandler.js";
export { requestIdMiddleware, resolveRequestId } from "./middleware/requestId.js";
