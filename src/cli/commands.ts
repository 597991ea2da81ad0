/**
 * CLI command implementations. Each returns the process exit code.
 */
import { writeFile } from "node:fs/promises";
import { serve } from "@hono/node-server";

import { createApp } from "../api/index.js";
import { getDeviceConfig, getDiscoveryConfig, getPairingConfig } from "../config.js";
import { formatConnectionError } from "../connection/index.js";
import { type Device, createDevice } from "../device/index.js";
import { createHostProbeDiscoverer } from "../discovery/index.js";
import { createFleet, formatFleetError, loadMetersFile, toFleetReading } from "../fleet/index.js";
import type { HttpClient } from "../http/index.js";
import { createLogger } from "../logger.js";
import {
  type PairingStatus,
  discoverAndPair,
  formatPairingError,
  pairDevice,
} from "../pairing/index.js";
import {
  clearLine,
  isAffirmative,
  renderAttemptProgress,
  renderBanner,
  renderDiscoveredDevice,
  renderFailureWarning,
  renderHeading,
  renderMetersConfig,
  renderMetersFile,
  renderSpinner,
  renderStatusLine,
  renderStatusUpdate,
} from "./render.js";
import type {
  DiscoverCommand,
  PairCommand,
  ReadCommand,
  ServeCommand,
  Terminal,
} from "./schema.js";

const log = createLogger("cli");

const SPINNER_INTERVAL_MS = 100;
const MEASUREMENT_POLL_MS = 100;

export type CommandContext = Readonly<{
  terminal: Terminal;
  http: HttpClient;
}>;

// =============================================================================
// pair
// =============================================================================

export async function runPair(command: PairCommand, ctx: CommandContext): Promise<number> {
  const { terminal, http } = ctx;
  const timing = getPairingConfig();

  terminal.writeLine(renderHeading("Device Pairing"));
  terminal.writeLine(`Device: ${command.host}`);
  terminal.writeLine();
  terminal.writeLine("Press the button on your device NOW!");
  terminal.writeLine();

  const result = await pairDevice(command.host, command.name, {
    http,
    ...timing,
    onAttempt: (attempt) => terminal.write(renderAttemptProgress(attempt, timing.maxAttempts)),
  });
  terminal.writeLine();

  if (result.isErr()) {
    terminal.writeLine(`Pairing failed: ${formatPairingError(result.error)}`);
    return 1;
  }

  terminal.writeLine();
  terminal.writeLine(renderBanner("Pairing Successful!"));
  terminal.writeLine(`Token: ${result.value}`);
  return 0;
}

// =============================================================================
// discover
// =============================================================================

function startSpinner(terminal: Terminal): () => void {
  let tick = 0;
  terminal.write(renderSpinner(tick));
  const interval = setInterval(() => {
    tick += 1;
    terminal.write(renderSpinner(tick));
  }, SPINNER_INTERVAL_MS);

  let running = true;
  return () => {
    if (running) {
      running = false;
      clearInterval(interval);
      terminal.write(clearLine());
    }
  };
}

export async function runDiscover(
  command: DiscoverCommand,
  ctx: CommandContext,
): Promise<number> {
  const { terminal, http } = ctx;
  const { quietPeriodMs } = getDiscoveryConfig();

  terminal.writeLine(renderHeading("Device Discovery"));
  terminal.writeLine(`Scanning ${command.host.length} host(s) (max ${command.timeout}s)...`);
  terminal.writeLine();

  let found = 0;
  let boardSize = 0;
  const stopSpinner = startSpinner(terminal);

  const result = await discoverAndPair(command.name, {
    http,
    ...getPairingConfig(),
    discoverer: createHostProbeDiscoverer(command.host, http),
    scanTimeoutMs: command.timeout * 1000,
    quietPeriodMs,
    onFound: (device) => {
      found += 1;
      terminal.write(clearLine());
      terminal.writeLine(renderDiscoveredDevice(found, device));
    },
    confirm: async () => {
      stopSpinner();
      terminal.writeLine();
      const answer = await terminal.ask("Is this everything? [Y/n]: ");
      if (isAffirmative(answer)) {
        return true;
      }
      terminal.writeLine();
      terminal.writeLine("Discovery aborted.");
      terminal.writeLine(
        "Please ensure all devices are powered on and on the same network, then try again.",
      );
      return false;
    },
    onBatchStart: (statuses: ReadonlyArray<PairingStatus>) => {
      boardSize = statuses.length;
      terminal.writeLine();
      terminal.writeLine(renderHeading("Device Pairing"));
      terminal.writeLine("Press the button on ALL devices NOW!");
      terminal.writeLine();
      statuses.forEach((status, index) => terminal.writeLine(renderStatusLine(index, status)));
    },
    onStatus: (index, status) => terminal.write(renderStatusUpdate(index, status, boardSize)),
  }).finally(stopSpinner);

  if (result.isErr()) {
    if (result.error.type !== "ABORTED") {
      terminal.writeLine(`Error: ${formatPairingError(result.error)}`);
    }
    return 1;
  }

  const { paired, failedCount } = result.value;
  terminal.writeLine();

  const warning = renderFailureWarning(failedCount);
  if (warning !== null) {
    terminal.writeLine();
    terminal.writeLine(warning);
  }

  terminal.writeLine();
  terminal.writeLine(renderBanner("Configuration Complete!"));
  terminal.writeLine(renderMetersConfig(paired));

  if (command.write !== undefined && paired.length > 0) {
    await writeFile(command.write, renderMetersFile(paired), "utf8");
    terminal.writeLine(`Meters file written to ${command.write}`);
  }

  return paired.length > 0 ? 0 : 1;
}

// =============================================================================
// read
// =============================================================================

function waitForMeasurement(device: Device, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const deadline = Date.now() + timeoutMs;
    const check = () => {
      if (device.meter.lastUpdated() !== null) {
        resolve(true);
      } else if (Date.now() >= deadline) {
        resolve(false);
      } else {
        setTimeout(check, MEASUREMENT_POLL_MS);
      }
    };
    check();
  });
}

export async function runRead(command: ReadCommand, ctx: CommandContext): Promise<number> {
  const { terminal, http } = ctx;
  const deviceConfig = getDeviceConfig();

  const device = createDevice(command.type, {
    host: command.host,
    token: command.token,
    timeoutMs: deviceConfig.timeoutMs,
    reconnectDelayMs: deviceConfig.reconnectDelayMs,
    handshakeTimeoutMs: deviceConfig.connectTimeoutMs,
    idleTimeoutMs: deviceConfig.idleTimeoutMs,
    http,
  });

  const connected = await device.startAndWait(deviceConfig.connectTimeoutMs);
  if (connected.isErr()) {
    terminal.writeLine(`Cannot connect: ${formatConnectionError(connected.error)}`);
    return 1;
  }

  try {
    if (!(await waitForMeasurement(device, deviceConfig.timeoutMs))) {
      terminal.writeLine(`No measurement within ${deviceConfig.timeoutMs}ms`);
      return 1;
    }
    terminal.writeLine(JSON.stringify(toFleetReading(command.host, device), null, 2));
    return 0;
  } finally {
    device.stop();
  }
}

// =============================================================================
// serve
// =============================================================================

export async function runServe(command: ServeCommand, ctx: CommandContext): Promise<number> {
  const deviceConfig = getDeviceConfig();

  const entries = await loadMetersFile(command.meters);
  if (entries.isErr()) {
    ctx.terminal.writeLine(formatFleetError(entries.error));
    return 1;
  }

  const fleet = createFleet(entries.value, {
    http: ctx.http,
    timeoutMs: deviceConfig.timeoutMs,
    reconnectDelayMs: deviceConfig.reconnectDelayMs,
    handshakeTimeoutMs: deviceConfig.connectTimeoutMs,
    idleTimeoutMs: deviceConfig.idleTimeoutMs,
  });
  await fleet.startAll(deviceConfig.connectTimeoutMs);

  const server = serve({ fetch: createApp(fleet).fetch, port: command.port, hostname: "0.0.0.0" });
  log.info({ port: command.port, meters: fleet.names().length }, `🚀 API listening on port ${command.port}`);

  const shutdown = (signal: string) => {
    log.info({ signal }, `${signal} received. Shutting down gracefully...`);
    fleet.stopAll();
    server.close(() => process.exit(0));
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  return 0;
}
