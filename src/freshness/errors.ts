/**
 * Freshness Module - Error Types
 *
 * A cache read fails only one way: the value is missing or too old.
 */

export type FreshnessError = {
  readonly type: "STALE";
  readonly message: string;
  /** Age of the stored value in ms, null when nothing was ever written */
  readonly ageMs: number | null;
  readonly maxAgeMs: number;
};

/**
 * Create a STALE error.
 */
export function stale(ageMs: number | null, maxAgeMs: number): FreshnessError {
  const message =
    ageMs === null
      ? "No value received yet"
      : `Value is ${ageMs}ms old (max ${maxAgeMs}ms)`;
  return { type: "STALE", message, ageMs, maxAgeMs };
}

/**
 * Format a FreshnessError for logging.
 */
export function formatFreshnessError(error: FreshnessError): string {
  return `Stale: ${error.message}`;
}
