/**
 * CLI option schemas. commander hands options over untyped; each command
 * validates its own before running.
 */
import { z } from "zod";

import { DeviceTypeSchema } from "../device/index.js";

export const DEFAULT_CLIENT_NAME = "meterlink";

export const PairCommandSchema = z.object({
  host: z.string().min(1),
  name: z.string().default(DEFAULT_CLIENT_NAME),
});

export type PairCommand = z.infer<typeof PairCommandSchema>;

export const DiscoverCommandSchema = z.object({
  host: z.array(z.string().min(1)).min(1),
  name: z.string().default(DEFAULT_CLIENT_NAME),
  timeout: z.coerce.number().int().positive().describe("Scan window in seconds"),
  write: z.string().min(1).optional().describe("Also write a meters file here"),
});

export type DiscoverCommand = z.infer<typeof DiscoverCommandSchema>;

export const ReadCommandSchema = z.object({
  type: DeviceTypeSchema,
  host: z.string().min(1),
  token: z.string().min(1),
});

export type ReadCommand = z.infer<typeof ReadCommandSchema>;

export const ServeCommandSchema = z.object({
  meters: z.string().min(1),
  port: z.coerce.number().int().positive(),
});

export type ServeCommand = z.infer<typeof ServeCommandSchema>;

/**
 * Everything a command needs from the outside world.
 */
export type Terminal = Readonly<{
  write: (text: string) => void;
  writeLine: (text?: string) => void;
  ask: (question: string) => Promise<string>;
}>;
