/**
 * Pairing Module - Service Layer
 *
 * Obtains API tokens by polling the device's user endpoint until its
 * button is pressed. Batches pair every device concurrently under one
 * deadline and publish progress through a status board.
 */
import { type Result, err, ok } from "neverthrow";

import { collectDevices, formatDiscoveryError } from "../discovery/index.js";
import {
  API_VERSION_HEADERS,
  type HttpClient,
  formatHttpError,
  hasStatus,
} from "../http/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type PairingError,
  aborted,
  authorizationPending,
  cancelled,
  discoveryFailed,
  noDevices,
  pairingTimeout,
  protocolError,
  requestFailed,
} from "./errors.js";
import {
  type BatchPairingHandle,
  type BatchPairingOptions,
  type BatchResult,
  type DiscoverAndPairOptions,
  PAIRING_DEFAULTS,
  type PairDeviceOptions,
  type PairingOutcome,
  type PairingStatus,
  type PairingTarget,
  TokenResponseSchema,
} from "./schema.js";
import {
  buildTokenRequest,
  buildUserUrl,
  collectPaired,
  countFailed,
  failedStatus,
  initialStatus,
  pairedStatus,
  validateName,
  waitingStatus,
} from "./transform.js";

const log = createLogger("pairing");

/**
 * Resolve after ms, or early with false when the signal aborts.
 */
function delay(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

// =============================================================================
// Token Request
// =============================================================================

/**
 * Ask the device for a token. HTTP 403 means the button has not been
 * pressed yet and comes back as AUTHORIZATION_PENDING.
 */
export async function requestToken(
  http: HttpClient,
  host: string,
  name: string,
  signal?: AbortSignal,
): Promise<Result<string, PairingError>> {
  const response = await http.request({
    method: "POST",
    url: buildUserUrl(host),
    headers: API_VERSION_HEADERS,
    body: buildTokenRequest(name),
    ...(signal ? { signal } : {}),
  });

  if (response.isErr()) {
    const error = response.error;
    if (hasStatus(error, 403)) {
      return err(authorizationPending());
    }
    if (error.type === "HTTP_STATUS") {
      return err(protocolError(error.message, error.status));
    }
    return err(requestFailed(formatHttpError(error)));
  }

  const parsed = TokenResponseSchema.safeParse(response.value);
  if (!parsed.success) {
    return err(protocolError("Response did not contain a token"));
  }

  return ok(parsed.data.token);
}

// =============================================================================
// Single Device
// =============================================================================

/**
 * Pair one device. Attempt 1 goes out immediately, then one attempt per
 * poll interval until a token arrives, a non-pending error occurs, the
 * attempt budget is spent or the deadline passes.
 */
export async function pairDevice(
  host: string,
  name: string,
  options: PairDeviceOptions,
): Promise<Result<string, PairingError>> {
  const validName = validateName(name);
  if (validName.isErr()) {
    return err(validName.error);
  }

  const { http, onAttempt, signal } = options;
  const pollIntervalMs = options.pollIntervalMs ?? PAIRING_DEFAULTS.pollIntervalMs;
  const maxAttempts = options.maxAttempts ?? PAIRING_DEFAULTS.maxAttempts;
  const deadlineMs = options.deadlineMs ?? PAIRING_DEFAULTS.deadlineMs;

  const startTime = Date.now();
  logOperationStart(log, "pairDevice", { host, maxAttempts });

  const controller = new AbortController();
  const deadline = setTimeout(() => controller.abort(), deadlineMs);
  const onExternalAbort = () => controller.abort();
  signal?.addEventListener("abort", onExternalAbort, { once: true });
  if (signal?.aborted) {
    controller.abort();
  }

  let attempts = 0;

  try {
    while (attempts < maxAttempts) {
      if (attempts > 0 && !(await delay(pollIntervalMs, controller.signal))) {
        break;
      }
      if (controller.signal.aborted) {
        break;
      }

      attempts += 1;
      onAttempt?.(attempts);

      const result = await requestToken(http, host, name, controller.signal);
      if (result.isOk()) {
        logOperationComplete(log, "pairDevice", startTime, { host, attempts });
        return ok(result.value);
      }

      if (controller.signal.aborted) {
        break;
      }
      if (result.error.type !== "AUTHORIZATION_PENDING") {
        logOperationFailed(log, "pairDevice", result.error.message, { host, attempts });
        return err(result.error);
      }

      log.debug({ host, attempt: attempts }, "Button not pressed yet");
    }
  } finally {
    clearTimeout(deadline);
    signal?.removeEventListener("abort", onExternalAbort);
  }

  const error = signal?.aborted ? cancelled() : pairingTimeout(attempts, deadlineMs);
  logOperationFailed(log, "pairDevice", error.message, { host, attempts });
  return err(error);
}

// =============================================================================
// Batch
// =============================================================================

/**
 * Pair several devices concurrently under one shared deadline.
 *
 * Each device runs with its own abort controller so cancel(host) stops
 * exactly one of them. Rows on the board are replaced in synchronous
 * sections, so a listener always sees whole rows.
 */
export function startBatchPairing(
  devices: ReadonlyArray<PairingTarget>,
  name: string,
  options: BatchPairingOptions,
): Result<BatchPairingHandle, PairingError> {
  const validName = validateName(name);
  if (validName.isErr()) {
    return err(validName.error);
  }

  const { http, onStatus } = options;
  const maxAttempts = options.maxAttempts ?? PAIRING_DEFAULTS.maxAttempts;
  const statuses: PairingStatus[] = devices.map(initialStatus);
  const controllers = devices.map(() => new AbortController());

  const startTime = Date.now();
  logOperationStart(log, "pairBatch", { devices: devices.length });
  options.onBatchStart?.([...statuses]);

  function update(index: number, change: (status: PairingStatus) => PairingStatus): void {
    const current = statuses[index];
    if (current === undefined) {
      return;
    }
    const next = change(current);
    statuses[index] = next;
    onStatus?.(index, next);
  }

  const runs = devices.map(async (device, index) => {
    const result = await pairDevice(device.host, name, {
      http,
      pollIntervalMs: options.pollIntervalMs,
      maxAttempts,
      deadlineMs: options.deadlineMs,
      signal: controllers[index]?.signal,
      onAttempt: (attempt) => update(index, (s) => waitingStatus(s, attempt, maxAttempts)),
    });

    result.match(
      (token) => update(index, (s) => pairedStatus(s, token)),
      (error) => update(index, (s) => failedStatus(s, error)),
    );
  });

  const done = Promise.all(runs).then((): BatchResult => {
    const snapshot = [...statuses];
    const result: BatchResult = {
      paired: collectPaired(snapshot),
      failedCount: countFailed(snapshot),
      statuses: snapshot,
    };
    logOperationComplete(log, "pairBatch", startTime, {
      paired: result.paired.length,
      failed: result.failedCount,
    });
    return result;
  });

  return ok({
    statuses: () => [...statuses],
    cancel: (host) => {
      const index = devices.findIndex((device) => device.host === host);
      const controller = controllers[index];
      if (controller === undefined || controller.signal.aborted) {
        return false;
      }
      controller.abort();
      return true;
    },
    done,
  });
}

/**
 * Pair several devices and wait for every attempt to settle.
 */
export async function pairDevices(
  devices: ReadonlyArray<PairingTarget>,
  name: string,
  options: BatchPairingOptions,
): Promise<PairingOutcome> {
  const handle = startBatchPairing(devices, name, options);
  if (handle.isErr()) {
    return err(handle.error);
  }
  return ok(await handle.value.done);
}

// =============================================================================
// Discover and Pair
// =============================================================================

/**
 * Discover devices, confirm the list, then pair everything found.
 */
export async function discoverAndPair(
  name: string,
  options: DiscoverAndPairOptions,
): Promise<PairingOutcome> {
  const validName = validateName(name);
  if (validName.isErr()) {
    return err(validName.error);
  }

  const collected = await collectDevices(options.discoverer, {
    scanTimeoutMs: options.scanTimeoutMs,
    quietPeriodMs: options.quietPeriodMs,
    onFound: options.onFound,
  });
  if (collected.isErr()) {
    return err(discoveryFailed(formatDiscoveryError(collected.error)));
  }

  const devices = collected.value;
  if (devices.length === 0) {
    return err(noDevices());
  }

  if (!(await options.confirm(devices))) {
    log.info({ found: devices.length }, "Discovery rejected by user");
    return err(aborted());
  }

  return pairDevices(devices, name, options);
}
