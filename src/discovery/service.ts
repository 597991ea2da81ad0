/**
 * Discovery Module - Service Layer
 *
 * Runs a discoverer for a bounded window and collects what it reports.
 */
import { type Result, err, ok } from "neverthrow";

import { API_VERSION_HEADERS, type HttpClient, formatHttpError } from "../http/index.js";
import { createLogger, logOperationComplete, logOperationStart } from "../logger.js";
import { type DiscoveryError, scanFailed } from "./errors.js";
import {
  type CollectOptions,
  DEFAULT_QUIET_PERIOD_MS,
  DeviceInfoSchema,
  type DiscoveredDevice,
  type Discoverer,
} from "./schema.js";
import { buildInfoUrl, toDiscoveredDevice } from "./transform.js";

const log = createLogger("discovery");

// =============================================================================
// Collection
// =============================================================================

/**
 * Collect devices until no new device has arrived for the quiet period,
 * the scan window closes, or the discoverer returns on its own.
 *
 * Devices are deduplicated by host and returned in arrival order. The
 * quiet period starts with the first arrival.
 */
export async function collectDevices(
  discoverer: Discoverer,
  options: CollectOptions,
): Promise<Result<DiscoveredDevice[], DiscoveryError>> {
  const { scanTimeoutMs, onFound } = options;
  const quietPeriodMs = options.quietPeriodMs ?? DEFAULT_QUIET_PERIOD_MS;
  const startTime = Date.now();
  logOperationStart(log, "collectDevices", { scanTimeoutMs, quietPeriodMs });

  const controller = new AbortController();
  const devices: DiscoveredDevice[] = [];
  const seen = new Set<string>();
  let quietTimer: ReturnType<typeof setTimeout> | undefined;

  const scanTimer = setTimeout(() => controller.abort(), scanTimeoutMs);
  const scanEnded = new Promise<void>((resolve) => {
    controller.signal.addEventListener("abort", () => resolve(), { once: true });
  });

  const report = (device: DiscoveredDevice): void => {
    if (controller.signal.aborted || seen.has(device.host)) {
      return;
    }

    seen.add(device.host);
    devices.push(device);
    log.debug({ host: device.host, type: device.type }, "Device found");
    onFound?.(device);

    clearTimeout(quietTimer);
    quietTimer = setTimeout(() => controller.abort(), quietPeriodMs);
  };

  try {
    // Called inside the try so a discoverer that throws before returning
    // its promise still clears the timers.
    const running = discoverer(controller.signal, report);
    await Promise.race([running, scanEnded]);
    controller.abort();
    await running;
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(scanFailed("Discoverer failed", cause));
  } finally {
    clearTimeout(scanTimer);
    clearTimeout(quietTimer);
  }

  logOperationComplete(log, "collectDevices", startTime, { found: devices.length });
  return ok(devices);
}

// =============================================================================
// Host Probing
// =============================================================================

/**
 * Discoverer that identifies a fixed list of hosts via `GET /api`.
 * Hosts that fail or report an unsupported product are skipped.
 */
export function createHostProbeDiscoverer(
  hosts: ReadonlyArray<string>,
  http: HttpClient,
): Discoverer {
  return async (signal, onFound) => {
    await Promise.all(
      hosts.map(async (host) => {
        const response = await http.request({
          method: "GET",
          url: buildInfoUrl(host),
          headers: API_VERSION_HEADERS,
          signal,
        });

        if (response.isErr()) {
          if (response.error.type !== "ABORTED") {
            log.warn({ host, error: formatHttpError(response.error) }, "Probe failed");
          }
          return;
        }

        const parsed = DeviceInfoSchema.safeParse(response.value);
        if (!parsed.success) {
          log.warn({ host }, "Probe returned an unrecognised identification payload");
          return;
        }

        const device = toDiscoveredDevice(host, parsed.data);
        if (device === null) {
          log.info(
            { host, productType: parsed.data.product_type },
            "Skipping unsupported product",
          );
          return;
        }

        onFound(device);
      }),
    );
  };
}
