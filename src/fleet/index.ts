/**
 * Fleet Module - Public API
 */
export type {
  Fleet,
  FleetOptions,
  FleetReading,
  MeterEntry,
  MeterReading,
  MetersFile,
  StartSummary,
} from "./schema.js";
export type { FleetError } from "./errors.js";

export { MeterEntrySchema, MetersFileSchema } from "./schema.js";
export { formatFleetError } from "./errors.js";
export { createFleet, loadMetersFile } from "./service.js";
export { parseMetersFile, toFleetReading, toReading } from "./transform.js";
