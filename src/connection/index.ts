/**
 * Connection Module - Public API
 */
export type {
  Envelope,
  LinkState,
  MessageHandler,
  StreamingConnection,
  Transport,
  TransportEvents,
  TransportFactory,
} from "./schema.js";
export type { ConnectionError } from "./errors.js";
export type { StreamingConnectionOptions } from "./service.js";

export { HANDSHAKE_TYPES } from "./schema.js";
export { formatConnectionError } from "./errors.js";
export { createStreamingConnection } from "./service.js";
export { createWebSocketTransport } from "./transport.js";
export {
  buildStreamUrl,
  decodeEnvelope,
  describeErrorPayload,
  encodeEnvelope,
} from "./transform.js";
