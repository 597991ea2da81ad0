import { describe, expect, it } from "vitest";

import { deviceTypeForProduct, toDiscoveredDevice } from "../transform.js";

describe("Discovery Transforms", () => {
  it.each([
    ["HWE-P1", "p1meter"],
    ["HWE-KWH1", "kwhmeter"],
    ["HWE-KWH3", "kwhmeter"],
    ["SDM230-wifi", "kwhmeter"],
    ["SDM630-wifi", "kwhmeter"],
    ["HWE-BAT", "battery"],
  ])("maps %s to %s", (productType, type) => {
    expect(deviceTypeForProduct(productType)).toBe(type);
  });

  it("returns null for unsupported products", () => {
    expect(deviceTypeForProduct("HWE-SKT")).toBeNull();
    expect(
      toDiscoveredDevice("10.0.0.4", {
        product_name: "Energy Socket",
        product_type: "HWE-SKT",
        serial: "01",
      }),
    ).toBeNull();
  });

  it("names the instance after product and serial", () => {
    expect(
      toDiscoveredDevice("10.0.0.6", {
        product_name: "Plug-In Battery",
        product_type: "HWE-BAT",
        serial: "5c2faf000001",
      }),
    ).toEqual({
      host: "10.0.0.6",
      instance: "Plug-In Battery 5c2faf000001",
      type: "battery",
      productType: "HWE-BAT",
    });
  });
});
