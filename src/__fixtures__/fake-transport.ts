/**
 * In-process stand-in for the device stream.
 *
 * Each call of the factory creates one FakeSocket that a test drives by hand:
 * open it, push frames, drop it, and inspect what the client wrote.
 */
import type { TransportEvents, TransportFactory } from "../connection/index.js";

export type FakeSocket = {
  readonly url: string;
  readonly sent: string[];
  closed: boolean;
  failSends: boolean;
  open: () => void;
  receive: (frame: unknown) => void;
  receiveRaw: (raw: string) => void;
  drop: (code?: number, reason?: string) => void;
  fail: (message: string) => void;
  sentFrames: () => unknown[];
};

export type FakeTransport = {
  readonly factory: TransportFactory;
  readonly sockets: FakeSocket[];
  latest: () => FakeSocket;
};

function createFakeSocket(url: string, events: TransportEvents): FakeSocket {
  const socket: FakeSocket = {
    url,
    sent: [],
    closed: false,
    failSends: false,
    open: () => events.onOpen(),
    receive: (frame) => events.onMessage(JSON.stringify(frame)),
    receiveRaw: (raw) => events.onMessage(raw),
    drop: (code = 1006, reason = "") => events.onClose(code, reason),
    fail: (message) => events.onError(new Error(message)),
    sentFrames: () => socket.sent.map((frame): unknown => JSON.parse(frame)),
  };
  return socket;
}

export function createFakeTransport(): FakeTransport {
  const sockets: FakeSocket[] = [];

  const factory: TransportFactory = (url, events) => {
    const socket = createFakeSocket(url, events);
    sockets.push(socket);
    return {
      send: (data) => {
        if (socket.failSends) {
          throw new Error("socket is not open");
        }
        socket.sent.push(data);
      },
      close: () => {
        socket.closed = true;
      },
    };
  };

  return {
    factory,
    sockets,
    latest: () => {
      const socket = sockets[sockets.length - 1];
      if (socket === undefined) {
        throw new Error("No socket has been opened");
      }
      return socket;
    },
  };
}

/**
 * Drive a socket through open → authorization_requested → authorized.
 */
export function completeHandshake(socket: FakeSocket): void {
  socket.open();
  socket.receive({ type: "authorization_requested", data: { api_version: "2.0.0" } });
  socket.receive({ type: "authorized" });
}

/**
 * Logger stand-in shared by tests that mock ../logger.js.
 */
export function silentLogger() {
  const noop = () => undefined;
  return {
    info: noop,
    debug: noop,
    warn: noop,
    error: noop,
    trace: noop,
    fatal: noop,
  };
}
