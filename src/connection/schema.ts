/**
 * Connection Module - Schemas and Types
 *
 * Frames on the device stream are JSON envelopes with a type discriminator.
 * The payload stays opaque here; device adapters decode it per type.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { ConnectionError } from "./errors.js";

// =============================================================================
// Wire Envelope
// =============================================================================

export const EnvelopeSchema = z.object({
  type: z.string().min(1).describe("Message type discriminator"),
  data: z.unknown().optional().describe("Type-specific payload"),
});

export type Envelope = Readonly<z.infer<typeof EnvelopeSchema>>;

/**
 * Message types used by the handshake. Everything else is forwarded.
 */
export const HANDSHAKE_TYPES = {
  authorizationRequested: "authorization_requested",
  authorization: "authorization",
  authorized: "authorized",
  subscribe: "subscribe",
  error: "error",
} as const;

// =============================================================================
// Link State
// =============================================================================

export type LinkState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "reconnecting";

/**
 * Progress through one session's handshake.
 */
export type HandshakePhase =
  | "awaiting_request"
  | "awaiting_authorized"
  | "ready";

// =============================================================================
// Transport
// =============================================================================

/**
 * Callbacks a transport invokes for one session. Frames arrive complete and
 * in order.
 */
export type TransportEvents = Readonly<{
  onOpen: () => void;
  onMessage: (data: string) => void;
  onClose: (code: number, reason: string) => void;
  onError: (error: Error) => void;
}>;

export type Transport = Readonly<{
  send: (data: string) => void;
  close: () => void;
}>;

export type TransportFactory = (url: string, events: TransportEvents) => Transport;

// =============================================================================
// Connection
// =============================================================================

/**
 * Receives every forwarded frame. A returned error is logged for that
 * message only.
 */
export type MessageHandler = (
  type: string,
  payload: unknown,
) => Result<void, { readonly message: string }>;

export type StreamingConnection = Readonly<{
  host: string;
  start: () => Promise<Result<void, ConnectionError>>;
  startAndWait: (timeoutMs: number) => Promise<Result<void, ConnectionError>>;
  send: (message: Envelope) => Result<void, ConnectionError>;
  stop: () => void;
  state: () => LinkState;
}>;
