#!/usr/bin/env node
/**
 * meterlink entry point.
 */
import { getDeviceConfig } from "../config.js";
import { createHttpClient } from "../http/index.js";
import { createLogger } from "../logger.js";
import { createProgram } from "./program.js";
import { createTerminal } from "./terminal.js";

const log = createLogger("cli");

const program = createProgram({
  terminal: createTerminal(),
  http: createHttpClient({ timeoutMs: getDeviceConfig().httpTimeoutMs }),
});

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  log.fatal({ error: message }, "Command crashed");
  console.error(`Fatal error: ${message}`);
  process.exit(1);
});
