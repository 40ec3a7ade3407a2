/**
 * statsd-datagram error hierarchy.
 *
 * All transport-specific errors inherit from StatsdError.
 */

/** Base error for all statsd-datagram errors. */
export class StatsdError extends Error {
  constructor(message?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "StatsdError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised when no IPv4 address can be derived from the configured name. */
export class AddressResolutionError extends StatsdError {
  readonly hostname: string;

  constructor(hostname: string, message?: string, cause?: unknown) {
    super(message ?? `Could not resolve an IPv4 address for '${hostname}'`, cause);
    this.name = "AddressResolutionError";
    this.hostname = hostname;
  }
}

/** Raised when a supplied option or environment override is malformed. */
export class ConfigurationError extends StatsdError {
  constructor(message?: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Raised when the socket reports a failure for a datagram send. */
export class TransportError extends StatsdError {
  constructor(message?: string, cause?: unknown) {
    super(message, cause);
    this.name = "TransportError";
  }
}
