/**
 * Pairing Service Tests
 *
 * Token requests are answered by a scripted in-process server keyed by
 * host and attempt number. Poll intervals and deadlines run on fake timers.
 */
import { type Result, err, ok } from "neverthrow";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../logger.js", async () => {
  const { silentLogger } = await import("../../__fixtures__/fake-transport.js");
  return {
    createLogger: () => silentLogger(),
    logOperationStart: vi.fn(),
    logOperationComplete: vi.fn(),
    logOperationFailed: vi.fn(),
  };
});

import type { DiscoveredDevice, Discoverer } from "../../discovery/index.js";
import {
  type HttpClient,
  type HttpError,
  httpStatus,
  networkError,
} from "../../http/index.js";
import type { PairingStatus, PairingTarget } from "../schema.js";
import {
  discoverAndPair,
  pairDevice,
  pairDevices,
  requestToken,
  startBatchPairing,
} from "../service.js";

type Reply = Result<unknown, HttpError>;

const pending = (): Reply => err(httpStatus(403, '{"error":"user:creation-not-enabled"}'));
const token = (value: string) => (): Reply => ok({ token: value });

/**
 * Answers each host's token requests by attempt number.
 */
function tokenServer(script: Record<string, (attempt: number) => Reply>) {
  const attempts: Record<string, number> = {};
  const request = vi.fn<HttpClient["request"]>(async ({ url }) => {
    const host = new URL(url).host;
    const attempt = (attempts[host] ?? 0) + 1;
    attempts[host] = attempt;
    const respond = script[host];
    return respond === undefined ? err(networkError(`No route to ${host}`)) : respond(attempt);
  });
  return { http: { request }, request, attempts };
}

describe("Pairing Service", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ===========================================================================
  // requestToken
  // ===========================================================================

  describe("requestToken", () => {
    it("posts the namespaced client name with the API version header", async () => {
      const { http, request } = tokenServer({ "10.0.0.2": token("test-token") });

      const result = await requestToken(http, "10.0.0.2", "meterlink");

      expect(result._unsafeUnwrap()).toBe("test-token");
      expect(request).toHaveBeenCalledWith({
        method: "POST",
        url: "https://10.0.0.2/api/user",
        headers: { "X-Api-Version": "2" },
        body: { name: "local/meterlink" },
      });
    });

    it("maps 403 to AUTHORIZATION_PENDING", async () => {
      const { http } = tokenServer({ "10.0.0.2": pending });

      const error = (await requestToken(http, "10.0.0.2", "meterlink"))._unsafeUnwrapErr();

      expect(error.type).toBe("AUTHORIZATION_PENDING");
    });

    it("maps other statuses to PROTOCOL_ERROR", async () => {
      const { http } = tokenServer({ "10.0.0.2": () => err(httpStatus(500, "internal error")) });

      const error = (await requestToken(http, "10.0.0.2", "meterlink"))._unsafeUnwrapErr();

      expect(error).toEqual({
        type: "PROTOCOL_ERROR",
        message: "HTTP 500: internal error",
        status: 500,
      });
    });

    it("rejects a response without a token", async () => {
      const { http } = tokenServer({ "10.0.0.2": () => ok({ token: "" }) });

      const error = (await requestToken(http, "10.0.0.2", "meterlink"))._unsafeUnwrapErr();

      expect(error.type).toBe("PROTOCOL_ERROR");
      expect(error.message).toBe("Response did not contain a token");
    });

    it("maps transport failures to REQUEST_FAILED", async () => {
      const { http } = tokenServer({});

      const error = (await requestToken(http, "10.0.0.9", "meterlink"))._unsafeUnwrapErr();

      expect(error).toEqual({
        type: "REQUEST_FAILED",
        message: "Network error: No route to 10.0.0.9",
      });
    });
  });

  // ===========================================================================
  // pairDevice
  // ===========================================================================

  describe("pairDevice", () => {
    it("rejects an invalid name without any request", async () => {
      const { http, request } = tokenServer({ "10.0.0.2": token("test-token") });

      const result = await pairDevice("10.0.0.2", "bad|name", { http });

      expect(result._unsafeUnwrapErr().type).toBe("INVALID_NAME");
      expect(request).not.toHaveBeenCalled();
    });

    it("issues the first attempt immediately", async () => {
      const { http, request } = tokenServer({ "10.0.0.2": token("test-token") });
      const onAttempt = vi.fn();

      const result = await pairDevice("10.0.0.2", "meterlink", { http, onAttempt });

      expect(result._unsafeUnwrap()).toBe("test-token");
      expect(onAttempt).toHaveBeenCalledWith(1);
      expect(request).toHaveBeenCalledTimes(1);
    });

    it("succeeds when the button is pressed before the last attempt", async () => {
      const { http, request } = tokenServer({
        "10.0.0.2": (attempt) => (attempt < 36 ? pending() : ok({ token: "test-token" })),
      });
      const onAttempt = vi.fn();

      const pairing = pairDevice("10.0.0.2", "meterlink", { http, onAttempt });
      await vi.advanceTimersByTimeAsync(175000);

      expect((await pairing)._unsafeUnwrap()).toBe("test-token");
      expect(request).toHaveBeenCalledTimes(36);
      expect(onAttempt).toHaveBeenLastCalledWith(36);
    });

    it("times out after the attempt budget while the device keeps answering 403", async () => {
      const { http, request } = tokenServer({ "10.0.0.2": pending });

      const pairing = pairDevice("10.0.0.2", "meterlink", { http });
      await vi.advanceTimersByTimeAsync(180000);

      const error = (await pairing)._unsafeUnwrapErr();
      expect(error).toEqual({
        type: "TIMEOUT",
        message: "No button press after 36 attempts (180s window)",
        attempts: 36,
      });
      expect(request).toHaveBeenCalledTimes(36);
    });

    it("times out at the deadline before the attempt budget is spent", async () => {
      const { http, request } = tokenServer({ "10.0.0.2": pending });

      const pairing = pairDevice("10.0.0.2", "meterlink", { http, deadlineMs: 57500 });
      await vi.advanceTimersByTimeAsync(57500);

      const error = (await pairing)._unsafeUnwrapErr();
      expect(error.type).toBe("TIMEOUT");
      expect(request).toHaveBeenCalledTimes(12);
    });

    it("stops at the first non-pending error", async () => {
      const { http, request } = tokenServer({
        "10.0.0.2": (attempt) => (attempt === 1 ? pending() : err(httpStatus(500, "internal error"))),
      });

      const pairing = pairDevice("10.0.0.2", "meterlink", { http });
      await vi.advanceTimersByTimeAsync(5000);

      expect((await pairing)._unsafeUnwrapErr().type).toBe("PROTOCOL_ERROR");
      expect(request).toHaveBeenCalledTimes(2);
    });

    it("reports CANCELLED when the caller aborts", async () => {
      const { http, request } = tokenServer({ "10.0.0.2": pending });
      const controller = new AbortController();

      const pairing = pairDevice("10.0.0.2", "meterlink", { http, signal: controller.signal });
      await vi.advanceTimersByTimeAsync(2000);
      controller.abort();

      expect((await pairing)._unsafeUnwrapErr().type).toBe("CANCELLED");
      expect(request).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // Batch pairing
  // ===========================================================================

  describe("startBatchPairing", () => {
    const targets: PairingTarget[] = [
      { host: "10.0.0.2", type: "p1meter" },
      { host: "10.0.0.3", type: "kwhmeter" },
      { host: "10.0.0.4", type: "battery" },
    ];

    it("pairs the others when one device fails", async () => {
      const { http } = tokenServer({
        "10.0.0.2": (attempt) => (attempt === 1 ? pending() : ok({ token: "token-a" })),
        "10.0.0.3": () => err(httpStatus(500, "internal error")),
        "10.0.0.4": token("token-c"),
      });

      const handle = startBatchPairing(targets, "meterlink", { http })._unsafeUnwrap();
      await vi.advanceTimersByTimeAsync(5000);
      const result = await handle.done;

      expect(result.paired).toEqual([
        { host: "10.0.0.2", token: "token-a", type: "p1meter" },
        { host: "10.0.0.4", token: "token-c", type: "battery" },
      ]);
      expect(result.failedCount).toBe(1);
      expect(result.statuses.map((s) => s.line)).toEqual([
        "✓ SUCCESS",
        "✗ FAILED: HTTP 500: internal error",
        "✓ SUCCESS",
      ]);
    });

    it("cancels one device and leaves its siblings running", async () => {
      const { http } = tokenServer({
        "10.0.0.2": (attempt) => (attempt < 3 ? pending() : ok({ token: "token-a" })),
        "10.0.0.3": pending,
      });

      const handle = startBatchPairing(targets.slice(0, 2), "meterlink", { http })._unsafeUnwrap();
      await vi.advanceTimersByTimeAsync(1000);

      expect(handle.cancel("10.0.0.3")).toBe(true);
      expect(handle.cancel("10.0.0.3")).toBe(false);
      expect(handle.cancel("10.0.0.99")).toBe(false);

      await vi.advanceTimersByTimeAsync(9000);
      const result = await handle.done;

      expect(result.paired).toEqual([{ host: "10.0.0.2", token: "token-a", type: "p1meter" }]);
      expect(result.statuses[1]?.line).toBe("✗ FAILED: Pairing was cancelled");
      expect(result.statuses[1]?.error?.type).toBe("CANCELLED");
    });

    it("publishes the initial board and every row change", async () => {
      const { http } = tokenServer({ "10.0.0.2": token("test-token") });
      const boards: Array<ReadonlyArray<PairingStatus>> = [];
      const changes: Array<[number, string]> = [];

      const handle = startBatchPairing([{ host: "10.0.0.2", type: "p1meter" }], "meterlink", {
        http,
        onBatchStart: (statuses) => boards.push(statuses),
        onStatus: (index, status) => changes.push([index, status.line]),
      })._unsafeUnwrap();
      await handle.done;

      expect(boards).toHaveLength(1);
      expect(boards[0]?.map((s) => s.line)).toEqual(["initializing..."]);
      expect(changes).toEqual([
        [0, "waiting for button press (attempt 1/36)..."],
        [0, "✓ SUCCESS"],
      ]);
      expect(handle.statuses()[0]?.token).toBe("test-token");
    });

    it("rejects an invalid name before starting", () => {
      const { http, request } = tokenServer({});

      const result = startBatchPairing(targets, "x".repeat(41), { http });

      expect(result._unsafeUnwrapErr().type).toBe("INVALID_NAME");
      expect(request).not.toHaveBeenCalled();
    });

    it("pairDevices resolves with the settled batch", async () => {
      const { http } = tokenServer({ "10.0.0.2": token("token-a"), "10.0.0.3": token("token-b") });

      const result = await pairDevices(targets.slice(0, 2), "meterlink", { http });

      expect(result._unsafeUnwrap().paired.map((p) => p.token)).toEqual(["token-a", "token-b"]);
      expect(result._unsafeUnwrap().failedCount).toBe(0);
    });
  });

  // ===========================================================================
  // discoverAndPair
  // ===========================================================================

  describe("discoverAndPair", () => {
    const found: DiscoveredDevice[] = [
      { host: "10.0.0.2", instance: "P1 Meter 01", type: "p1meter", productType: "HWE-P1" },
      { host: "10.0.0.3", instance: "kWh Meter 02", type: "kwhmeter", productType: "HWE-KWH1" },
    ];

    const discoverer =
      (devices: DiscoveredDevice[]): Discoverer =>
      async (_signal, onFound) => {
        devices.forEach((device) => onFound(device));
      };

    it("pairs every confirmed device", async () => {
      const { http } = tokenServer({ "10.0.0.2": token("token-a"), "10.0.0.3": token("token-b") });
      const confirm = vi.fn(async () => true);

      const result = await discoverAndPair("meterlink", {
        http,
        discoverer: discoverer(found),
        scanTimeoutMs: 30000,
        confirm,
      });

      expect(confirm).toHaveBeenCalledWith(found);
      expect(result._unsafeUnwrap().paired).toEqual([
        { host: "10.0.0.2", token: "token-a", type: "p1meter" },
        { host: "10.0.0.3", token: "token-b", type: "kwhmeter" },
      ]);
    });

    it("fails with NO_DEVICES when nothing is found", async () => {
      const { http } = tokenServer({});
      const confirm = vi.fn(async () => true);

      const result = await discoverAndPair("meterlink", {
        http,
        discoverer: discoverer([]),
        scanTimeoutMs: 30000,
        confirm,
      });

      expect(result._unsafeUnwrapErr().type).toBe("NO_DEVICES");
      expect(confirm).not.toHaveBeenCalled();
    });

    it("aborts without pairing when the list is rejected", async () => {
      const { http, request } = tokenServer({ "10.0.0.2": token("token-a") });

      const result = await discoverAndPair("meterlink", {
        http,
        discoverer: discoverer(found),
        scanTimeoutMs: 30000,
        confirm: async () => false,
      });

      expect(result._unsafeUnwrapErr().type).toBe("ABORTED");
      expect(request).not.toHaveBeenCalled();
    });

    it("reports a failing discoverer", async () => {
      const { http } = tokenServer({});

      const result = await discoverAndPair("meterlink", {
        http,
        discoverer: async () => {
          throw new Error("boom");
        },
        scanTimeoutMs: 30000,
        confirm: async () => true,
      });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "DISCOVERY_FAILED",
        message: "Scan failed: Discoverer failed (boom)",
      });
    });

    it("rejects an invalid name before scanning", async () => {
      const { http } = tokenServer({});
      const scan = vi.fn<Discoverer>(async () => undefined);

      const result = await discoverAndPair("", {
        http,
        discoverer: scan,
        scanTimeoutMs: 30000,
        confirm: async () => true,
      });

      expect(result._unsafeUnwrapErr().type).toBe("INVALID_NAME");
      expect(scan).not.toHaveBeenCalled();
    });
  });
});
