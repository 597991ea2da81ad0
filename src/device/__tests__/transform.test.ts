import { describe, expect, it } from "vitest";

import {
  BatteriesDataSchema,
  KwhMeasurementSchema,
  P1MeasurementSchema,
} from "../schema.js";
import {
  decodePayload,
  negate,
  phaseValues,
  toPowerLimits,
  totalGridImport,
} from "../transform.js";

describe("Device Transforms", () => {
  describe("decodePayload", () => {
    it("defaults absent fields to 0 and drops unknown ones", () => {
      const result = decodePayload(KwhMeasurementSchema, "measurement", {
        power_w: 120,
        protocol_version: 2,
      });

      const measurement = result._unsafeUnwrap();
      expect(measurement.power_w).toBe(120);
      expect(measurement.energy_export_kwh).toBe(0);
      expect("protocol_version" in measurement).toBe(false);
    });

    it("reports every failing field", () => {
      const result = decodePayload(KwhMeasurementSchema, "measurement", {
        power_w: "high",
        voltage_v: null,
      });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "DECODE_FAILED",
        message: "Cannot decode measurement payload",
        messageType: "measurement",
        issues: "power_w: Expected number, received string; voltage_v: Expected number, received null",
      });
    });

    it("rejects a payload that is not an object", () => {
      const error = decodePayload(BatteriesDataSchema, "batteries", "zero")._unsafeUnwrapErr();

      expect(error.type).toBe("DECODE_FAILED");
      expect(error.message).toBe("Cannot decode batteries payload");
    });
  });

  describe("negate", () => {
    it("flips the sign without producing -0", () => {
      expect(negate(250)).toBe(-250);
      expect(negate(-250)).toBe(250);
      expect(Object.is(negate(0), 0)).toBe(true);
    });
  });

  describe("phaseValues", () => {
    it("puts the aggregate on L1 for a 1-phase meter", () => {
      expect(phaseValues(1, 900, [300, 300, 300])).toEqual([900, 0, 0]);
    });

    it("returns per-phase values for a 3-phase meter", () => {
      expect(phaseValues(3, 900, [200, 300, 400])).toEqual([200, 300, 400]);
    });
  });

  describe("energy and limits", () => {
    it("sums import over both tariffs", () => {
      const measurement = P1MeasurementSchema.parse({
        energy_import_t1_kwh: 1000.5,
        energy_import_t2_kwh: 250,
        energy_export_t1_kwh: 99,
      });

      expect(totalGridImport(measurement)).toBe(1250.5);
    });

    it("maps consumption to charge and production to discharge", () => {
      const data = BatteriesDataSchema.parse({
        mode: "zero",
        max_consumption_w: 1600,
        max_production_w: 800,
      });

      expect(toPowerLimits(data)).toEqual({ maxChargeW: 1600, maxDischargeW: 800 });
    });
  });
});
