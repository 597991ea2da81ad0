/**
 * Connection Module - Pure Transformations
 *
 * Frame encoding and decoding. No side effects, no I/O.
 */
import { type Result, err, ok } from "neverthrow";

import type { ConnectionError } from "./errors.js";
import { decodeError } from "./errors.js";
import type { Envelope } from "./schema.js";
import { EnvelopeSchema, HANDSHAKE_TYPES } from "./schema.js";

/**
 * WebSocket endpoint of a device.
 *
 * @example
 * buildStreamUrl("192.168.1.20") // "wss://192.168.1.20/api/ws"
 */
export function buildStreamUrl(host: string): string {
  return `wss://${host}/api/ws`;
}

/**
 * Decode one inbound text frame into an envelope.
 */
export function decodeEnvelope(raw: string): Result<Envelope, ConnectionError> {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return err(decodeError("Frame is not valid JSON", raw));
  }

  const parsed = EnvelopeSchema.safeParse(data);
  if (!parsed.success) {
    return err(decodeError("Frame has no message type", raw));
  }

  return ok(parsed.data);
}

export function encodeEnvelope(message: Envelope): string {
  return JSON.stringify(message);
}

export function authorizationFrame(token: string): string {
  return encodeEnvelope({ type: HANDSHAKE_TYPES.authorization, data: token });
}

export function subscribeFrame(topic: string): string {
  return encodeEnvelope({ type: HANDSHAKE_TYPES.subscribe, data: topic });
}

/**
 * Best-effort human text for an `error` frame payload.
 *
 * @example
 * describeErrorPayload({ message: "user:unauthorized" }) // "user:unauthorized"
 */
export function describeErrorPayload(payload: unknown): string {
  if (typeof payload === "string" && payload !== "") {
    return payload;
  }

  if (
    typeof payload === "object" &&
    payload !== null &&
    "message" in payload &&
    typeof payload.message === "string"
  ) {
    return payload.message;
  }

  return "Device reported an error";
}
