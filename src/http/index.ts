/**
 * HTTP Module - Public API
 */
export type { HttpClient, HttpMethod, HttpRequest } from "./schema.js";
export type { HttpError } from "./errors.js";
export type { HttpClientOptions } from "./service.js";

export { API_VERSION_HEADERS } from "./schema.js";
export {
  aborted,
  formatHttpError,
  hasStatus,
  httpStatus,
  invalidResponse,
  networkError,
  timeout,
} from "./errors.js";
export { createHttpClient } from "./service.js";
