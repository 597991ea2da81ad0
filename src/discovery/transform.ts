/**
 * Discovery Module - Pure Transformations
 */
import type { DeviceType } from "../device/index.js";
import type { DeviceInfo, DiscoveredDevice } from "./schema.js";

/**
 * Product types that speak the streaming API, by device type.
 */
const PRODUCT_TYPES: Readonly<Record<string, DeviceType | undefined>> = {
  "HWE-P1": "p1meter",
  "HWE-KWH1": "kwhmeter",
  "HWE-KWH3": "kwhmeter",
  "SDM230-wifi": "kwhmeter",
  "SDM630-wifi": "kwhmeter",
  "HWE-BAT": "battery",
};

/**
 * Map a product type to a device type, null for unsupported products.
 */
export function deviceTypeForProduct(productType: string): DeviceType | null {
  return PRODUCT_TYPES[productType] ?? null;
}

/**
 * Build a discovered device from its identification payload.
 */
export function toDiscoveredDevice(
  host: string,
  info: DeviceInfo,
): DiscoveredDevice | null {
  const type = deviceTypeForProduct(info.product_type);
  if (type === null) {
    return null;
  }

  return {
    host,
    instance: `${info.product_name} ${info.serial}`,
    type,
    productType: info.product_type,
  };
}

export function buildInfoUrl(host: string): string {
  return `https://${host}/api`;
}
