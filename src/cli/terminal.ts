/**
 * stdout/stdin terminal. Logs go to stderr, so stdout carries only what
 * the commands print.
 */
import { createInterface } from "node:readline/promises";

import type { Terminal } from "./schema.js";

export function createTerminal(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Terminal {
  return {
    write: (text) => {
      output.write(text);
    },
    writeLine: (text = "") => {
      output.write(`${text}\n`);
    },
    ask: async (question) => {
      const rl = createInterface({ input, output });
      try {
        return await rl.question(question);
      } finally {
        rl.close();
      }
    },
  };
}
