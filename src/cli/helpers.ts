/**
 * CLI helper utilities shared across commands.
 */

import { ConfigurationError } from "../protocol/index.js";

/**
 * Parse an integer option value. Undefined passes through so the
 * config's env-var and default rules still apply.
 */
export function parseIntOption(
  name: string,
  value: string | undefined
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigurationError(`Option --${name} must be a non-negative integer, got '${value}'`);
  }
  return parseInt(value, 10);
}

/**
 * Render a chunk for display, with newlines made visible.
 */
export function formatChunk(index: number, chunk: Uint8Array): string {
  const text = Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength)
    .toString("utf8")
    .replace(/\n/g, "\\n");
  return `[${index}] ${chunk.length}B ${text}`;
}

/**
 * Report a failed command as `Error: <message>` and exit with code 1.
 */
export function commandFailed(err: unknown): never {
  cliError(`Error: ${err instanceof Error ? err.message : String(err)}`);
}

/**
 * Print an error message to stderr and exit with code 1.
 */
export function cliError(msg: string): never {
  process.stderr.write(msg + "\n");
  process.exit(1);
}
