/**
 * statsd-datagram resolve -- Print the IPv4 endpoint a host resolves to.
 */

import { TransportConfig } from "../../sdk/config.js";
import { DnsEndpointResolver } from "../../sdk/resolver.js";
import { commandFailed, parseIntOption } from "../helpers.js";

export async function resolveCommand(
  host: string | undefined,
  options: { port?: string }
): Promise<void> {
  try {
    const config = new TransportConfig({
      host,
      port: parseIntOption("port", options.port),
    });
    const endpoint = await new DnsEndpointResolver().resolve(config.host, config.port);
    console.log(`${endpoint.address}:${endpoint.port}`);
  } catch (err) {
    commandFailed(err);
  }
}
