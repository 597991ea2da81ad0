/**
 * Freshness Module - Types
 */
import type { Result } from "neverthrow";

import type { FreshnessError } from "./errors.js";

/**
 * Millisecond clock, injectable for tests.
 */
export type Clock = () => number;

/**
 * One stored value with its write time. Replaced as a whole on every write.
 */
export type FreshnessSlot<T> = Readonly<{
  value: T;
  timestamp: number;
}>;

/**
 * Single-slot store of the latest value of a continuously updated quantity.
 */
export type FreshnessCache<T> = Readonly<{
  maxAgeMs: number;
  set: (value: T) => void;
  get: () => Result<T, FreshnessError>;
  lastUpdated: () => number | null;
}>;
