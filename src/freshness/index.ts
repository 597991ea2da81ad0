/**
 * Freshness Module - Public API
 */
export type { Clock, FreshnessCache } from "./schema.js";
export type { FreshnessError } from "./errors.js";

export { formatFreshnessError, stale } from "./errors.js";
export { createFreshnessCache } from "./service.js";
