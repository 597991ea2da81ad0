/**
 * Connection Module - Service Layer
 *
 * Owns one persistent, authenticated stream to one device:
 * handshake, topic subscription, in-order dispatch and reconnect.
 *
 * Lifecycle: disconnected → connecting → connected, and on link loss
 * reconnecting → connecting → … until stop(), which is terminal.
 *
 * A session that does not finish its handshake within handshakeTimeoutMs,
 * or a connected session that receives nothing for idleTimeoutMs, counts as
 * lost. Devices push measurements continuously, so silence means a dead link.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { ConnectionError } from "./errors.js";
import {
  authRejected,
  connectTimeout,
  formatConnectionError,
  linkError,
  notConnected,
  stopped,
} from "./errors.js";
import type {
  Envelope,
  HandshakePhase,
  LinkState,
  MessageHandler,
  StreamingConnection,
  Transport,
  TransportFactory,
} from "./schema.js";
import { HANDSHAKE_TYPES } from "./schema.js";
import {
  authorizationFrame,
  buildStreamUrl,
  decodeEnvelope,
  describeErrorPayload,
  encodeEnvelope,
  subscribeFrame,
} from "./transform.js";
import { createWebSocketTransport } from "./transport.js";

const log = createLogger("connection");

const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10000;
const DEFAULT_IDLE_TIMEOUT_MS = 30000;

export type StreamingConnectionOptions = Readonly<{
  host: string;
  token: string;
  topics: ReadonlyArray<string>;
  onMessage: MessageHandler;
  reconnectDelayMs: number;
  /** Max time from opening a session to a completed handshake */
  handshakeTimeoutMs?: number | undefined;
  /** Max silence on a connected session before it is dropped */
  idleTimeoutMs?: number | undefined;
  transportFactory?: TransportFactory | undefined;
}>;

type StartResult = Result<void, ConnectionError>;

/**
 * Create a stream for one device. Nothing happens until start().
 */
export function createStreamingConnection(
  options: StreamingConnectionOptions,
): StreamingConnection {
  const { host, token, topics, onMessage, reconnectDelayMs } = options;
  const handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
  const idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
  const transportFactory =
    options.transportFactory ?? createWebSocketTransport(handshakeTimeoutMs);
  const url = buildStreamUrl(host);

  let state: LinkState = "disconnected";
  let phase: HandshakePhase = "awaiting_request";
  let isStopped = false;
  let transport: Transport | null = null;
  let session = 0;
  let reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  let handshakeTimer: ReturnType<typeof setTimeout> | null = null;
  let idleTimer: ReturnType<typeof setTimeout> | null = null;
  let startPromise: Promise<StartResult> | null = null;
  let settleStart: ((result: StartResult) => void) | null = null;

  // ===========================================================================
  // Session management
  // ===========================================================================

  function resolveStart(result: StartResult): void {
    const settle = settleStart;
    settleStart = null;
    settle?.(result);
  }

  function openSession(): void {
    session += 1;
    const id = session;
    const isCurrent = () => id === session && !isStopped;

    phase = "awaiting_request";
    state = "connecting";
    log.debug({ host, url }, "Opening stream...");

    let opened: Transport;
    try {
      opened = transportFactory(url, {
        onOpen: () => {
          if (isCurrent()) {
            log.debug({ host }, "Stream open, awaiting authorization request");
          }
        },
        onMessage: (raw) => {
          if (isCurrent()) {
            handleFrame(raw);
          }
        },
        onClose: (code, reason) => {
          if (isCurrent()) {
            const detail = reason === "" ? `${code}` : `${code}: ${reason}`;
            handleLinkLoss(linkError(`Stream closed (${detail})`));
          }
        },
        onError: (error) => {
          if (isCurrent()) {
            handleLinkLoss(linkError(error.message, error));
          }
        },
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      handleLinkLoss(linkError(`Failed to open stream to ${url}`, cause));
      return;
    }

    // The factory may already have reported a failure for this session.
    if (!isCurrent()) {
      opened.close();
      return;
    }

    transport = opened;
    handshakeTimer = setTimeout(() => {
      handshakeTimer = null;
      if (isCurrent()) {
        handleLinkLoss(linkError(`Handshake timed out after ${handshakeTimeoutMs}ms`));
      }
    }, handshakeTimeoutMs);
  }

  function clearSessionTimers(): void {
    if (handshakeTimer !== null) {
      clearTimeout(handshakeTimer);
      handshakeTimer = null;
    }
    if (idleTimer !== null) {
      clearTimeout(idleTimer);
      idleTimer = null;
    }
  }

  /**
   * Restart the silence window of a connected session.
   */
  function armIdleTimer(): void {
    if (idleTimer !== null) {
      clearTimeout(idleTimer);
    }
    idleTimer = setTimeout(() => {
      idleTimer = null;
      handleLinkLoss(linkError(`No frames received for ${idleTimeoutMs}ms`));
    }, idleTimeoutMs);
  }

  /**
   * Drop the current session and schedule the next one. Bumping the
   * session id makes any later event from the dropped transport a no-op.
   */
  function handleLinkLoss(error: ConnectionError): void {
    const dropped = transport;
    transport = null;
    session += 1;
    clearSessionTimers();
    dropped?.close();

    log.warn(
      { host, error: formatConnectionError(error), retryInMs: reconnectDelayMs },
      "Stream lost, reconnecting",
    );

    resolveStart(err(error));
    state = "reconnecting";
    scheduleReconnect();
  }

  function scheduleReconnect(): void {
    if (isStopped || reconnectTimer !== null) {
      return;
    }

    reconnectTimer = setTimeout(() => {
      reconnectTimer = null;
      if (!isStopped) {
        openSession();
      }
    }, reconnectDelayMs);
  }

  function writeFrame(frame: string): Result<void, ConnectionError> {
    if (transport === null) {
      return err(notConnected(state));
    }

    try {
      transport.send(frame);
      return ok(undefined);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      return err(linkError("Failed to write frame", cause));
    }
  }

  // ===========================================================================
  // Inbound frames
  // ===========================================================================

  function handleFrame(raw: string): void {
    if (phase === "ready") {
      armIdleTimer();
    }

    const decoded = decodeEnvelope(raw);
    if (decoded.isErr()) {
      log.warn(
        { host, error: formatConnectionError(decoded.error) },
        "Dropping undecodable frame",
      );
      return;
    }

    const { type, data } = decoded.value;

    switch (phase) {
      case "awaiting_request":
        if (type === HANDSHAKE_TYPES.authorizationRequested) {
          sendHandshakeFrame(authorizationFrame(token));
          phase = "awaiting_authorized";
        } else {
          log.debug({ host, type }, "Ignoring frame before authorization");
        }
        return;

      case "awaiting_authorized":
        if (type === HANDSHAKE_TYPES.authorized) {
          completeHandshake();
        } else if (type === HANDSHAKE_TYPES.error) {
          handleLinkLoss(authRejected(describeErrorPayload(data)));
        } else {
          log.debug({ host, type }, "Ignoring frame before authorization");
        }
        return;

      case "ready":
        if (type === HANDSHAKE_TYPES.error) {
          log.warn(
            { host, error: describeErrorPayload(data) },
            "Device reported an error",
          );
          return;
        }
        dispatch(type, data);
        return;
    }
  }

  function sendHandshakeFrame(frame: string): void {
    const result = writeFrame(frame);
    if (result.isErr()) {
      handleLinkLoss(result.error);
    }
  }

  function completeHandshake(): void {
    for (const topic of topics) {
      const result = writeFrame(subscribeFrame(topic));
      if (result.isErr()) {
        handleLinkLoss(result.error);
        return;
      }
    }

    clearSessionTimers();
    phase = "ready";
    state = "connected";
    armIdleTimer();
    log.info({ host, topics }, "Stream connected");
    resolveStart(ok(undefined));
  }

  function dispatch(type: string, payload: unknown): void {
    try {
      const result = onMessage(type, payload);
      if (result.isErr()) {
        log.warn(
          { host, type, error: result.error.message },
          "Message handling failed",
        );
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ host, type, error: message }, "Message handler threw");
    }
  }

  // ===========================================================================
  // Public operations
  // ===========================================================================

  function start(): Promise<StartResult> {
    if (isStopped) {
      return Promise.resolve(err(stopped()));
    }
    if (startPromise !== null) {
      return startPromise;
    }

    startPromise = new Promise<StartResult>((resolve) => {
      settleStart = resolve;
    });
    openSession();
    return startPromise;
  }

  async function startAndWait(timeoutMs: number): Promise<StartResult> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<StartResult>((resolve) => {
      timer = setTimeout(() => resolve(err(connectTimeout(timeoutMs))), timeoutMs);
    });

    const result = await Promise.race([start(), timedOut]);
    clearTimeout(timer);

    if (result.isErr()) {
      stop();
    }
    return result;
  }

  function send(message: Envelope): Result<void, ConnectionError> {
    if (state !== "connected") {
      return err(notConnected(state));
    }
    return writeFrame(encodeEnvelope(message));
  }

  function stop(): void {
    if (isStopped) {
      return;
    }

    isStopped = true;
    if (reconnectTimer !== null) {
      clearTimeout(reconnectTimer);
      reconnectTimer = null;
    }

    session += 1;
    clearSessionTimers();
    const current = transport;
    transport = null;
    current?.close();

    state = "disconnected";
    log.info({ host }, "Stream stopped");
    resolveStart(err(stopped()));
  }

  return {
    host,
    start,
    startAndWait,
    send,
    stop,
    state: () => state,
  };
}
