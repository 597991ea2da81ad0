/**
 * Connection Module - WebSocket Transport
 *
 * Adapts a ws socket to the transport callbacks the connection consumes.
 * Devices serve self-signed certificates, so verification is off.
 */
import { WebSocket } from "ws";

import type { TransportFactory } from "./schema.js";

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}

export function createWebSocketTransport(
  handshakeTimeoutMs: number,
): TransportFactory {
  return (url, events) => {
    const socket = new WebSocket(url, {
      rejectUnauthorized: false,
      handshakeTimeout: handshakeTimeoutMs,
    });

    socket.on("open", () => events.onOpen());
    socket.on("message", (data) => events.onMessage(rawDataToString(data)));
    socket.on("close", (code, reason) =>
      events.onClose(code, reason.toString("utf8")),
    );
    socket.on("error", (error) => events.onError(error));

    return {
      send: (data) => socket.send(data),
      close: () => socket.terminate(),
    };
  };
}
