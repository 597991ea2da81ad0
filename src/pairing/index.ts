/**
 * Pairing Module - Public API
 */
export type {
  BatchPairingHandle,
  BatchPairingOptions,
  BatchResult,
  DiscoverAndPairOptions,
  PairDeviceOptions,
  PairedDevice,
  PairingOutcome,
  PairingStatus,
  PairingStatusKind,
  PairingTarget,
} from "./schema.js";
export type { PairingError } from "./errors.js";

export { NAME_PATTERN, PAIRING_DEFAULTS } from "./schema.js";
export { formatPairingError } from "./errors.js";
export {
  discoverAndPair,
  pairDevice,
  pairDevices,
  requestToken,
  startBatchPairing,
} from "./service.js";
export { buildTokenRequest, validateName } from "./transform.js";
