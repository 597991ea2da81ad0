/**
 * Freshness Module - Cache
 *
 * The slot is swapped as one immutable object, so a read never observes
 * a value from one write paired with the timestamp of another.
 */
import { err, ok } from "neverthrow";

import { stale } from "./errors.js";
import type { Clock, FreshnessCache, FreshnessSlot } from "./schema.js";

/**
 * Create a cache whose reads fail once the last write is older than maxAgeMs.
 *
 * @example
 * const cache = createFreshnessCache<number>(30_000);
 * cache.set(42);
 * cache.get(); // ok(42) for the next 30s, then err(STALE)
 */
export function createFreshnessCache<T>(
  maxAgeMs: number,
  now: Clock = Date.now,
): FreshnessCache<T> {
  let slot: FreshnessSlot<T> | null = null;

  return {
    maxAgeMs,

    set(value) {
      slot = { value, timestamp: now() };
    },

    get() {
      const current = slot;
      if (current === null) {
        return err(stale(null, maxAgeMs));
      }

      const ageMs = now() - current.timestamp;
      if (ageMs > maxAgeMs) {
        return err(stale(ageMs, maxAgeMs));
      }

      return ok(current.value);
    },

    lastUpdated() {
      return slot?.timestamp ?? null;
    },
  };
}
