/**
 * Connection Transform Tests
 */
import { describe, expect, it } from "vitest";

import {
  authorizationFrame,
  buildStreamUrl,
  decodeEnvelope,
  describeErrorPayload,
  subscribeFrame,
} from "../transform.js";

describe("Connection Transform", () => {
  describe("buildStreamUrl", () => {
    it("targets the secure websocket endpoint", () => {
      expect(buildStreamUrl("192.168.1.20")).toBe("wss://192.168.1.20/api/ws");
    });
  });

  describe("decodeEnvelope", () => {
    it("keeps the payload undecoded", () => {
      const result = decodeEnvelope('{"type":"measurement","data":{"power_w":-120.5}}');

      expect(result._unsafeUnwrap()).toEqual({
        type: "measurement",
        data: { power_w: -120.5 },
      });
    });

    it("accepts frames without data", () => {
      expect(decodeEnvelope('{"type":"authorized"}')._unsafeUnwrap()).toEqual({
        type: "authorized",
      });
    });

    it("rejects invalid JSON", () => {
      const error = decodeEnvelope("nope")._unsafeUnwrapErr();

      expect(error).toEqual({
        type: "DECODE_ERROR",
        message: "Frame is not valid JSON",
        raw: "nope",
      });
    });

    it("rejects frames without a type", () => {
      const error = decodeEnvelope('{"data":1}')._unsafeUnwrapErr();

      expect(error.message).toBe("Frame has no message type");
    });

    it("rejects an empty type", () => {
      expect(decodeEnvelope('{"type":""}').isErr()).toBe(true);
    });
  });

  describe("handshake frames", () => {
    it("encodes the authorization frame", () => {
      expect(authorizationFrame("test-token")).toBe(
        '{"type":"authorization","data":"test-token"}',
      );
    });

    it("encodes a subscription frame", () => {
      expect(subscribeFrame("batteries")).toBe(
        '{"type":"subscribe","data":"batteries"}',
      );
    });
  });

  describe("describeErrorPayload", () => {
    it("uses a string payload as is", () => {
      expect(describeErrorPayload("user:unauthorized")).toBe("user:unauthorized");
    });

    it("reads the message field of an object payload", () => {
      expect(describeErrorPayload({ message: "request:invalid" })).toBe(
        "request:invalid",
      );
    });

    it("falls back to a generic text", () => {
      expect(describeErrorPayload(42)).toBe("Device reported an error");
    });
  });
});
