/**
 * meterlink - Library Entry Point
 *
 * Streaming device adapters, button-press pairing, discovery and the
 * meter fleet behind the HTTP API. The `meterlink` CLI lives in cli/.
 */
export * from "./connection/index.js";
export * from "./device/index.js";
export * from "./discovery/index.js";
export * from "./fleet/index.js";
export * from "./freshness/index.js";
export * from "./http/index.js";
export * from "./pairing/index.js";
export { createApp } from "./api/index.js";
