/**
 * CLI output formatting. Pure functions: every string the CLI prints to
 * stdout is built here.
 */
import type { DiscoveredDevice } from "../discovery/index.js";
import type { PairedDevice, PairingStatus } from "../pairing/index.js";

const CLEAR_LINE = "\r\x1b[K";

export const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"] as const;

export function renderHeading(title: string): string {
  return `${title}\n${"=".repeat(title.length)}\n`;
}

export function renderBanner(title: string): string {
  const rule = "=".repeat(40);
  return `${rule}\n${title}\n${rule}\n`;
}

// =============================================================================
// Discovery
// =============================================================================

export function renderSpinner(tick: number): string {
  const frame = SPINNER_FRAMES[tick % SPINNER_FRAMES.length] ?? SPINNER_FRAMES[0];
  return `\r${frame} Searching...`;
}

export function clearLine(): string {
  return CLEAR_LINE;
}

export function renderDiscoveredDevice(count: number, device: DiscoveredDevice): string {
  return `  ${count}. ${device.instance} (${device.type}) at ${device.host}`;
}

/**
 * Interpret the answer to "Is this everything? [Y/n]". Empty means yes.
 */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized !== "n" && normalized !== "no";
}

// =============================================================================
// Pairing
// =============================================================================

export function renderAttemptProgress(attempt: number, maxAttempts: number): string {
  return `\rWaiting for button press (attempt ${attempt}/${maxAttempts})...`;
}

export function renderStatusLine(index: number, status: PairingStatus): string {
  return `[${index + 1}] ${status.host}: ${status.line}`;
}

/**
 * Redraw one row of a board already printed above the cursor, then
 * return the cursor to the line below the board.
 */
export function renderStatusUpdate(
  index: number,
  status: PairingStatus,
  totalLines: number,
): string {
  const offset = totalLines - index;
  return `\x1b[${offset}A${CLEAR_LINE}${renderStatusLine(index, status)}\x1b[${offset}B\r`;
}

export function renderFailureWarning(failedCount: number): string | null {
  return failedCount > 0 ? `Warning: ${failedCount} device(s) failed to pair` : null;
}

// =============================================================================
// Meters Configuration
// =============================================================================

function numbered(base: string, index: number): string {
  return index === 0 ? base : `${base}${index + 1}`;
}

export type NamedMeter = Readonly<{
  name: string;
  device: PairedDevice;
}>;

/**
 * Name paired devices for a meters list: the first grid meter as `grid`,
 * energy meters as `pv`, `pv2`, ... and batteries as `battery`,
 * `battery2`, ... Further grid meters are left out.
 */
export function nameMeters(devices: ReadonlyArray<PairedDevice>): NamedMeter[] {
  const grid = devices.find((device) => device.type === "p1meter");
  const energyMeters = devices.filter((device) => device.type === "kwhmeter");
  const batteries = devices.filter((device) => device.type === "battery");

  return [
    ...(grid === undefined ? [] : [{ name: "grid", device: grid }]),
    ...energyMeters.map((device, i) => ({ name: numbered("pv", i), device })),
    ...batteries.map((device, i) => ({ name: numbered("battery", i), device })),
  ];
}

const CONFIG_TYPES = {
  p1meter: "homewizard-p1",
  kwhmeter: "homewizard-kwh",
  battery: "homewizard-battery",
} as const;

/**
 * Meters block for the paired devices. Batteries are controlled through
 * the grid meter; without one the controller line is commented out.
 */
export function renderMetersConfig(devices: ReadonlyArray<PairedDevice>): string {
  const meters = nameMeters(devices);
  const hasGrid = meters.some(({ device }) => device.type === "p1meter");

  const lines: string[] = ["meters:"];

  for (const { name, device } of meters) {
    lines.push(
      `- name: ${name}`,
      `  type: ${CONFIG_TYPES[device.type]}`,
      `  host: ${device.host}`,
      `  token: ${device.token}`,
    );
    if (device.type === "battery") {
      lines.push(
        hasGrid
          ? "  controller: grid  # Reference to the grid meter above"
          : "  # controller: grid  # Reference to the grid meter",
      );
    }
    lines.push("");
  }

  if (devices.length > 0) {
    lines.push(
      "# Notes:",
      "# - Each meter entry configures ONE device",
      "# - homewizard-p1: P1 meter for grid monitoring",
      "# - homewizard-kwh: kWh meter for PV monitoring",
      "# - homewizard-battery: Battery device for SoC and power",
      "# - Battery requires 'controller' parameter (name of the P1 meter)",
      "",
    );
  }

  return lines.join("\n");
}

/**
 * The same meters as a meters file for `serve`.
 */
export function renderMetersFile(devices: ReadonlyArray<PairedDevice>): string {
  const meters = nameMeters(devices).map(({ name, device }) => ({
    name,
    type: device.type,
    host: device.host,
    token: device.token,
  }));
  return `${JSON.stringify({ meters }, null, 2)}\n`;
}
