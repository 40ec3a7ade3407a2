/**
 * Pluggable endpoint resolver.
 *
 * Turns a configured name plus port into an immutable IPv4 Endpoint. The
 * lookup happens once, when the transport is opened, so a bad name fails
 * there and never at send time.
 */

import { isIP } from "node:net";
import type { LookupAddress } from "node:dns";
import { lookup as dnsLookup } from "node:dns/promises";

import { AddressResolutionError, ConfigurationError } from "../protocol/index.js";

/** A resolved IPv4 destination. */
export interface Endpoint {
  readonly address: string;
  readonly port: number;
  readonly family: 4;
}

/** Name-service lookup returning every address for a hostname. */
export type LookupAll = (hostname: string) => Promise<LookupAddress[]>;

const lookupAll: LookupAll = (hostname) => dnsLookup(hostname, { all: true });

/** Build a frozen Endpoint. */
export function createEndpoint(address: string, port: number): Endpoint {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(
      `Invalid port ${port}. Must be an integer between 1 and 65535`
    );
  }
  return Object.freeze({ address, port, family: 4 as const });
}

/**
 * Pick the IPv4 entry from a lookup result.
 *
 * Scans from the end: the IPv4 address is usually last, but not always.
 * Returns null when the list holds no IPv4 entry.
 */
export function pickIpv4(addresses: readonly LookupAddress[]): string | null {
  for (let i = addresses.length - 1; i >= 0; i--) {
    if (addresses[i].family === 4) {
      return addresses[i].address;
    }
  }
  return null;
}

/**
 * Pluggable endpoint resolver interface.
 */
export abstract class EndpointResolver {
  /**
   * Resolve `name` to an IPv4 endpoint on `port`.
   *
   * @throws {AddressResolutionError} If no IPv4 address can be produced.
   */
  abstract resolve(name: string, port: number): Promise<Endpoint>;
}

/**
 * Default resolver: literal IPv4 passes through, everything else goes
 * through `dns.lookup`.
 */
export class DnsEndpointResolver extends EndpointResolver {
  private _lookup: LookupAll;

  constructor(lookup?: LookupAll) {
    super();
    this._lookup = lookup ?? lookupAll;
  }

  async resolve(name: string, port: number): Promise<Endpoint> {
    const hostname = name.trim();
    if (!hostname) {
      throw new AddressResolutionError(name, "Hostname must not be empty");
    }

    switch (isIP(hostname)) {
      case 4:
        return createEndpoint(hostname, port);
      case 6:
        throw new AddressResolutionError(
          hostname,
          `'${hostname}' is an IPv6 address; only IPv4 destinations are supported`
        );
    }

    let addresses: LookupAddress[];
    try {
      addresses = await this._lookup(hostname);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new AddressResolutionError(
        hostname,
        `Could not resolve '${hostname}': ${reason}`,
        err
      );
    }

    const address = pickIpv4(addresses);
    if (address === null) {
      throw new AddressResolutionError(hostname);
    }
    return createEndpoint(address, port);
  }
}
