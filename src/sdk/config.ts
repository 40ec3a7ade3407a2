/**
 * Transport configuration.
 *
 * Priority (highest wins): constructor option > env var > default.
 * Everything is validated here so a bad value fails before any socket or
 * name lookup exists.
 */

import {
  ConfigurationError,
  DEFAULT_HOST,
  DEFAULT_MAX_PACKET_SIZE,
  DEFAULT_PORT,
  HOST_ENV_VAR,
  PORT_ENV_VAR,
} from "../protocol/index.js";

export interface TransportConfigOptions {
  /** Collector hostname or literal address. */
  host?: string | null;
  /** Collector port. 0 or unset means "not given". */
  port?: number | null;
  /** Maximum datagram size in bytes. 0 disables splitting. */
  maxPacketSize?: number | null;
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

/**
 * Parse the port env var. Unset yields `defaultValue`; anything that is not
 * a whole number in 1..65535 is rejected rather than ignored.
 */
export function portFromEnv(defaultValue: number): number {
  const raw = process.env[PORT_ENV_VAR];
  if (raw === undefined) {
    return defaultValue;
  }

  const trimmed = raw.trim();
  const port = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (!isValidPort(port)) {
    throw new ConfigurationError(
      `Environment variable '${PORT_ENV_VAR}' bad format: '${raw}'`
    );
  }
  return port;
}

/** Read the host env var; empty values count as unset. */
export function hostFromEnv(): string | null {
  const raw = process.env[HOST_ENV_VAR];
  return raw ? raw : null;
}

export class TransportConfig {
  readonly host: string;
  readonly port: number;
  readonly maxPacketSize: number;

  constructor(options: TransportConfigOptions = {}) {
    // Host: constructor arg > env var > default
    this.host = options.host || hostFromEnv() || DEFAULT_HOST;

    // Port: constructor arg (non-zero) > env var > default
    if (options.port) {
      if (!isValidPort(options.port)) {
        throw new ConfigurationError(
          `Invalid port ${options.port}. Must be an integer between 1 and 65535`
        );
      }
      this.port = options.port;
    } else {
      this.port = portFromEnv(DEFAULT_PORT);
    }

    const maxPacketSize = options.maxPacketSize ?? DEFAULT_MAX_PACKET_SIZE;
    if (!Number.isInteger(maxPacketSize) || maxPacketSize < 0) {
      throw new ConfigurationError(
        `Invalid maxPacketSize ${maxPacketSize}. Must be a non-negative integer`
      );
    }
    this.maxPacketSize = maxPacketSize;
  }
}
