/**
 * Tests for endpoint resolution.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

// Mock the name service -- must be before imports
const { mockDnsLookup } = vi.hoisted(() => ({ mockDnsLookup: vi.fn() }));

vi.mock("node:dns/promises", () => ({
  lookup: mockDnsLookup,
}));

import type { LookupAddress } from "node:dns";
import {
  DnsEndpointResolver,
  createEndpoint,
  pickIpv4,
} from "../../src/sdk/resolver.js";
import {
  AddressResolutionError,
  ConfigurationError,
} from "../../src/protocol/errors.js";

describe("pickIpv4", () => {
  it("returns the last IPv4 entry", () => {
    const addresses: LookupAddress[] = [
      { address: "10.0.0.1", family: 4 },
      { address: "::1", family: 6 },
      { address: "10.0.0.2", family: 4 },
      { address: "fe80::1", family: 6 },
    ];
    expect(pickIpv4(addresses)).toBe("10.0.0.2");
  });

  it("returns null when there is no IPv4 entry", () => {
    expect(pickIpv4([{ address: "::1", family: 6 }])).toBeNull();
    expect(pickIpv4([])).toBeNull();
  });
});

describe("createEndpoint", () => {
  it("builds a frozen IPv4 endpoint", () => {
    const endpoint = createEndpoint("127.0.0.1", 8125);
    expect(endpoint).toEqual({ address: "127.0.0.1", port: 8125, family: 4 });
    expect(Object.isFrozen(endpoint)).toBe(true);
  });

  it("rejects an invalid port", () => {
    expect(() => createEndpoint("127.0.0.1", 0)).toThrow(ConfigurationError);
  });
});

describe("DnsEndpointResolver", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("uses a literal IPv4 address without a lookup", async () => {
    const lookupFn = vi.fn();
    const resolver = new DnsEndpointResolver(lookupFn);

    const endpoint = await resolver.resolve("192.168.1.20", 8125);

    expect(endpoint).toEqual({ address: "192.168.1.20", port: 8125, family: 4 });
    expect(lookupFn).not.toHaveBeenCalled();
  });

  it("trims whitespace around the name", async () => {
    const resolver = new DnsEndpointResolver(vi.fn());
    const endpoint = await resolver.resolve("  10.0.0.5 ", 9125);
    expect(endpoint.address).toBe("10.0.0.5");
  });

  it("rejects a literal IPv6 address", async () => {
    const lookupFn = vi.fn();
    const resolver = new DnsEndpointResolver(lookupFn);

    await expect(resolver.resolve("::1", 8125)).rejects.toThrow(
      AddressResolutionError
    );
    expect(lookupFn).not.toHaveBeenCalled();
  });

  it("rejects an empty name", async () => {
    const resolver = new DnsEndpointResolver(vi.fn());
    await expect(resolver.resolve("  ", 8125)).rejects.toThrow(
      "Hostname must not be empty"
    );
  });

  it("picks the last IPv4 address from a mixed lookup", async () => {
    const lookupFn = vi.fn().mockResolvedValue([
      { address: "::1", family: 6 },
      { address: "127.0.0.1", family: 4 },
      { address: "fe80::1", family: 6 },
    ]);
    const resolver = new DnsEndpointResolver(lookupFn);

    const endpoint = await resolver.resolve("collector.internal", 8125);

    expect(endpoint).toEqual({ address: "127.0.0.1", port: 8125, family: 4 });
    expect(lookupFn).toHaveBeenCalledWith("collector.internal");
  });

  it("fails when the lookup returns only IPv6 addresses", async () => {
    const lookupFn = vi.fn().mockResolvedValue([{ address: "::1", family: 6 }]);
    const resolver = new DnsEndpointResolver(lookupFn);

    const err = await resolver.resolve("v6only.internal", 8125).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AddressResolutionError);
    expect(err).toMatchObject({
      hostname: "v6only.internal",
      message: "Could not resolve an IPv4 address for 'v6only.internal'",
    });
  });

  it("wraps lookup failures", async () => {
    const cause = new Error("getaddrinfo ENOTFOUND 999.999.999.999");
    const lookupFn = vi.fn().mockRejectedValue(cause);
    const resolver = new DnsEndpointResolver(lookupFn);

    const err = await resolver.resolve("999.999.999.999", 8125).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AddressResolutionError);
    expect(err).toMatchObject({
      hostname: "999.999.999.999",
      message:
        "Could not resolve '999.999.999.999': getaddrinfo ENOTFOUND 999.999.999.999",
      cause,
    });
    expect(lookupFn).toHaveBeenCalledTimes(1);
  });

  it("defaults to dns.lookup with all addresses", async () => {
    mockDnsLookup.mockResolvedValue([{ address: "10.1.2.3", family: 4 }]);
    const resolver = new DnsEndpointResolver();

    const endpoint = await resolver.resolve("statsd.internal", 8125);

    expect(endpoint.address).toBe("10.1.2.3");
    expect(mockDnsLookup).toHaveBeenCalledWith("statsd.internal", { all: true });
  });
});
