/**
 * Discovery Module - Public API
 */
export type {
  CollectOptions,
  DeviceInfo,
  DiscoveredDevice,
  Discoverer,
} from "./schema.js";
export type { DiscoveryError } from "./errors.js";

export { DEFAULT_QUIET_PERIOD_MS, DeviceInfoSchema } from "./schema.js";
export { formatDiscoveryError } from "./errors.js";
export { collectDevices, createHostProbeDiscoverer } from "./service.js";
export { deviceTypeForProduct, toDiscoveredDevice } from "./transform.js";
