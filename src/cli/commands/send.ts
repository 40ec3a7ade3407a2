/**
 * statsd-datagram send -- Send metric lines to the collector.
 */

import { StatsdTransport } from "../../sdk/client.js";
import { commandFailed, parseIntOption } from "../helpers.js";

export async function sendCommand(
  lines: string[],
  options: { host?: string; port?: string; maxPacketSize?: string }
): Promise<void> {
  let transport: StatsdTransport | null = null;
  try {
    transport = await StatsdTransport.open({
      host: options.host,
      port: parseIntOption("port", options.port),
      maxPacketSize: parseIntOption("max-packet-size", options.maxPacketSize),
    });

    const text = lines.join("\n");
    const datagrams = await transport.sendAsync(text);

    const { address, port } = transport.endpoint;
    console.log(
      `Sent ${Buffer.byteLength(text, "utf8")} byte(s) in ${datagrams} datagram(s) to ${address}:${port}`
    );
  } catch (err) {
    commandFailed(err);
  } finally {
    transport?.close();
  }
}
