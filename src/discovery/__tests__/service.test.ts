/**
 * Discovery Tests
 *
 * Scripted discoverers emit devices on fake timers so the quiet period and
 * scan window can be stepped through exactly.
 */
import { err, ok } from "neverthrow";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../logger.js", async () => {
  const { silentLogger } = await import("../../__fixtures__/fake-transport.js");
  return {
    createLogger: () => silentLogger(),
    logOperationStart: vi.fn(),
    logOperationComplete: vi.fn(),
  };
});

import { type HttpClient, aborted, httpStatus } from "../../http/index.js";
import type { DiscoveredDevice, Discoverer } from "../schema.js";
import { collectDevices, createHostProbeDiscoverer } from "../service.js";

function device(host: string, type: DiscoveredDevice["type"] = "kwhmeter"): DiscoveredDevice {
  return { host, instance: `Meter ${host}`, type, productType: "HWE-KWH1" };
}

/**
 * Emits each device at its offset and runs until aborted.
 */
function scripted(schedule: Array<[number, DiscoveredDevice]>): Discoverer {
  return (signal, onFound) =>
    new Promise<void>((resolve) => {
      const timers = schedule.map(([atMs, found]) => setTimeout(() => onFound(found), atMs));
      signal.addEventListener(
        "abort",
        () => {
          timers.forEach((timer) => clearTimeout(timer));
          resolve();
        },
        { once: true },
      );
    });
}

describe("Discovery", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ===========================================================================
  // collectDevices
  // ===========================================================================

  describe("collectDevices", () => {
    it("stops once the quiet period passes after the last arrival", async () => {
      const found: string[] = [];
      let settled = false;

      const collecting = collectDevices(
        scripted([
          [100, device("10.0.0.2", "p1meter")],
          [1000, device("10.0.0.3")],
        ]),
        {
          scanTimeoutMs: 30000,
          quietPeriodMs: 3000,
          onFound: (d) => found.push(d.host),
        },
      ).then((result) => {
        settled = true;
        return result;
      });

      await vi.advanceTimersByTimeAsync(3999);
      expect(found).toEqual(["10.0.0.2", "10.0.0.3"]);
      expect(settled).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      const result = await collecting;
      expect(settled).toBe(true);
      expect(result._unsafeUnwrap().map((d) => d.host)).toEqual(["10.0.0.2", "10.0.0.3"]);
    });

    it("waits for the first arrival before starting the quiet period", async () => {
      let settled = false;
      const collecting = collectDevices(scripted([[5000, device("10.0.0.2")]]), {
        scanTimeoutMs: 30000,
        quietPeriodMs: 3000,
      }).then((result) => {
        settled = true;
        return result;
      });

      await vi.advanceTimersByTimeAsync(4999);
      expect(settled).toBe(false);

      await vi.advanceTimersByTimeAsync(3001);
      expect((await collecting)._unsafeUnwrap()).toHaveLength(1);
    });

    it("deduplicates devices by host", async () => {
      const onFound = vi.fn();
      const collecting = collectDevices(
        scripted([
          [100, device("10.0.0.2")],
          [200, device("10.0.0.2")],
          [300, device("10.0.0.4")],
        ]),
        { scanTimeoutMs: 30000, onFound },
      );

      await vi.advanceTimersByTimeAsync(3300);

      expect((await collecting)._unsafeUnwrap().map((d) => d.host)).toEqual([
        "10.0.0.2",
        "10.0.0.4",
      ]);
      expect(onFound).toHaveBeenCalledTimes(2);
    });

    it("stops at the scan window even while devices keep arriving", async () => {
      const steady: Discoverer = (signal, onFound) =>
        new Promise<void>((resolve) => {
          let n = 0;
          const interval = setInterval(() => {
            n += 1;
            onFound(device(`10.0.1.${n}`));
          }, 2400);
          signal.addEventListener(
            "abort",
            () => {
              clearInterval(interval);
              resolve();
            },
            { once: true },
          );
        });

      const collecting = collectDevices(steady, { scanTimeoutMs: 10000, quietPeriodMs: 3000 });
      await vi.advanceTimersByTimeAsync(10000);

      expect((await collecting)._unsafeUnwrap().map((d) => d.host)).toEqual([
        "10.0.1.1",
        "10.0.1.2",
        "10.0.1.3",
        "10.0.1.4",
      ]);
    });

    it("returns as soon as the discoverer finishes", async () => {
      const finished: Discoverer = async (_signal, onFound) => {
        onFound(device("10.0.0.8"));
      };

      const result = await collectDevices(finished, { scanTimeoutMs: 30000 });

      expect(result._unsafeUnwrap().map((d) => d.host)).toEqual(["10.0.0.8"]);
    });

    it("returns an empty list when nothing is found", async () => {
      const collecting = collectDevices(scripted([]), { scanTimeoutMs: 5000 });
      await vi.advanceTimersByTimeAsync(5000);

      expect((await collecting)._unsafeUnwrap()).toEqual([]);
    });

    it("fails with SCAN_FAILED and clears its timers when the discoverer throws synchronously", async () => {
      const broken: Discoverer = () => {
        throw new Error("no network interface");
      };

      const error = (await collectDevices(broken, { scanTimeoutMs: 30000 }))._unsafeUnwrapErr();

      expect(error).toMatchObject({ type: "SCAN_FAILED", message: "Discoverer failed" });
      expect(vi.getTimerCount()).toBe(0);
    });

    it("fails with SCAN_FAILED when the discoverer throws", async () => {
      const broken: Discoverer = async () => {
        throw new Error("socket bind failed");
      };

      const error = (await collectDevices(broken, { scanTimeoutMs: 5000 }))._unsafeUnwrapErr();

      expect(error.type).toBe("SCAN_FAILED");
      expect(error.cause?.message).toBe("socket bind failed");
    });
  });

  // ===========================================================================
  // createHostProbeDiscoverer
  // ===========================================================================

  describe("createHostProbeDiscoverer", () => {
    const identities: Record<string, unknown> = {
      "https://10.0.0.2/api": {
        product_name: "P1 Meter",
        product_type: "HWE-P1",
        serial: "aabbccddeeff",
        api_version: "2.0.0",
      },
      "https://10.0.0.3/api": {
        product_name: "kWh Meter 3-phase",
        product_type: "HWE-KWH3",
        serial: "112233445566",
      },
      "https://10.0.0.4/api": {
        product_name: "Energy Socket",
        product_type: "HWE-SKT",
        serial: "998877665544",
      },
    };

    const http: HttpClient = {
      request: async ({ url }) => {
        const identity = identities[url];
        return identity === undefined ? err(httpStatus(404, "")) : ok(identity);
      },
    };

    it("reports supported devices and skips the rest", async () => {
      const found: DiscoveredDevice[] = [];
      const discover = createHostProbeDiscoverer(
        ["10.0.0.2", "10.0.0.3", "10.0.0.4", "10.0.0.5"],
        http,
      );

      await discover(new AbortController().signal, (d) => found.push(d));

      expect(found).toEqual([
        {
          host: "10.0.0.2",
          instance: "P1 Meter aabbccddeeff",
          type: "p1meter",
          productType: "HWE-P1",
        },
        {
          host: "10.0.0.3",
          instance: "kWh Meter 3-phase 112233445566",
          type: "kwhmeter",
          productType: "HWE-KWH3",
        },
      ]);
    });

    it("sends the API version header and the scan signal", async () => {
      const request = vi.fn<HttpClient["request"]>().mockResolvedValue(err(aborted()));
      const controller = new AbortController();

      await createHostProbeDiscoverer(["10.0.0.9"], { request })(controller.signal, vi.fn());

      expect(request).toHaveBeenCalledWith({
        method: "GET",
        url: "https://10.0.0.9/api",
        headers: { "X-Api-Version": "2" },
        signal: controller.signal,
      });
    });
  });
});
