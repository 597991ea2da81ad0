/**
 * meterlink command-line program.
 */
import { Command } from "commander";
import type { z } from "zod";

import { config, getDiscoveryConfig } from "../config.js";
import { type CommandContext, runDiscover, runPair, runRead, runServe } from "./commands.js";
import {
  DEFAULT_CLIENT_NAME,
  DiscoverCommandSchema,
  PairCommandSchema,
  ReadCommandSchema,
  ServeCommandSchema,
} from "./schema.js";

/**
 * Validate raw commander options and run the command, recording its exit code.
 */
function action<T>(
  ctx: CommandContext,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  run: (command: T, ctx: CommandContext) => Promise<number>,
): (options: unknown) => Promise<void> {
  return async (options) => {
    const parsed = schema.safeParse(options);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `--${issue.path.join(".")}: ${issue.message}`,
      );
      ctx.terminal.writeLine(`Invalid options:\n  ${issues.join("\n  ")}`);
      process.exitCode = 2;
      return;
    }
    process.exitCode = await run(parsed.data, ctx);
  };
}

export function createProgram(ctx: CommandContext): Command {
  const program = new Command();
  const scanSeconds = Math.round(getDiscoveryConfig().scanTimeoutMs / 1000);

  program
    .name("meterlink")
    .description("Pair, read and serve local energy meters and home batteries")
    .version("1.0.0");

  program
    .command("pair")
    .description("Pair one device by pressing its button")
    .requiredOption("--host <host>", "Device hostname or IP address")
    .option("--name <name>", "Client name registered on the device", DEFAULT_CLIENT_NAME)
    .action(action(ctx, PairCommandSchema, runPair));

  program
    .command("discover")
    .description("Probe hosts for devices and pair all of them at once")
    .requiredOption("--host <hosts...>", "Candidate hostnames or IP addresses")
    .option("--name <name>", "Client name registered on the devices", DEFAULT_CLIENT_NAME)
    .option("--timeout <seconds>", "Maximum scan time", String(scanSeconds))
    .option("--write <file>", "Also write the paired meters to a meters file")
    .action(action(ctx, DiscoverCommandSchema, runDiscover));

  program
    .command("read")
    .description("Connect to one paired device and print its latest reading")
    .requiredOption("--type <type>", "p1meter | kwhmeter | battery")
    .requiredOption("--host <host>", "Device hostname or IP address")
    .requiredOption("--token <token>", "Token obtained by pairing")
    .action(action(ctx, ReadCommandSchema, runRead));

  program
    .command("serve")
    .description("Stream every meter in a meters file and serve readings over HTTP")
    .option("--meters <file>", "Meters file", config.METERS_FILE)
    .option("--port <port>", "HTTP port", String(config.PORT))
    .action(action(ctx, ServeCommandSchema, runServe));

  return program;
}
