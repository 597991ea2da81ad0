/**
 * Fleet Module - Service Layer
 *
 * Owns one device adapter per meters-file entry and exposes their
 * readings by name.
 */
import { readFile } from "node:fs/promises";
import { type Result, err } from "neverthrow";

import { formatConnectionError } from "../connection/index.js";
import { createDevice } from "../device/index.js";
import { createLogger, logOperationComplete, logOperationStart } from "../logger.js";
import { type FleetError, readFailed } from "./errors.js";
import type { Fleet, FleetMember, FleetOptions, MeterEntry, StartSummary } from "./schema.js";
import { parseMetersFile, toFleetReading } from "./transform.js";

const log = createLogger("fleet");

/**
 * Read and validate a meters file.
 */
export async function loadMetersFile(
  path: string,
): Promise<Result<ReadonlyArray<MeterEntry>, FleetError>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(readFailed(path, cause));
  }

  return parseMetersFile(path, raw).map((meters) => {
    log.info({ path, meters: meters.length }, "Meters file loaded");
    return meters;
  });
}

/**
 * Build one device per entry. Nothing connects until startAll().
 */
export function createFleet(
  entries: ReadonlyArray<MeterEntry>,
  options: FleetOptions,
): Fleet {
  const members: FleetMember[] = entries.map((entry) => ({
    name: entry.name,
    device: createDevice(entry.type, {
      host: entry.host,
      token: entry.token,
      timeoutMs: options.timeoutMs,
      reconnectDelayMs: options.reconnectDelayMs,
      handshakeTimeoutMs: options.handshakeTimeoutMs,
      idleTimeoutMs: options.idleTimeoutMs,
      http: options.http,
      transportFactory: options.transportFactory,
      now: options.now,
    }),
  }));

  const byName = new Map(members.map((member) => [member.name, member.device]));

  /**
   * Wait up to timeoutMs for the first handshake. A device that misses
   * the window keeps reconnecting in the background.
   */
  async function startMember(member: FleetMember, timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });

    const outcome = await Promise.race([member.device.start(), timedOut]);
    clearTimeout(timer);

    if (outcome === "timeout") {
      log.warn(
        { meter: member.name, host: member.device.host, timeoutMs },
        "Meter not connected yet, retrying in background",
      );
      return false;
    }

    if (outcome.isErr()) {
      log.warn(
        { meter: member.name, host: member.device.host, error: formatConnectionError(outcome.error) },
        "Meter failed to connect, retrying in background",
      );
      return false;
    }

    return true;
  }

  return {
    names: () => members.map((member) => member.name),

    get: (name) => byName.get(name),

    async startAll(timeoutMs) {
      const startTime = Date.now();
      logOperationStart(log, "startAll", { meters: members.length });

      const started = await Promise.all(
        members.map((member) => startMember(member, timeoutMs)),
      );

      const summary: StartSummary = {
        connected: members.filter((_, i) => started[i] === true).map((m) => m.name),
        pending: members.filter((_, i) => started[i] !== true).map((m) => m.name),
      };
      logOperationComplete(log, "startAll", startTime, {
        connected: summary.connected.length,
        pending: summary.pending.length,
      });
      return summary;
    },

    stopAll() {
      members.forEach((member) => member.device.stop());
      log.info({ meters: members.length }, "All meters stopped");
    },

    readings: () => members.map((member) => toFleetReading(member.name, member.device)),

    reading: (name) => {
      const device = byName.get(name);
      return device === undefined ? undefined : toFleetReading(name, device);
    },
  };
}
