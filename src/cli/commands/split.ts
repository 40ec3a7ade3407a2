/**
 * statsd-datagram split -- Show how a batch would be cut into datagrams.
 *
 * Offline: nothing is resolved or sent.
 */

import { TransportConfig } from "../../sdk/config.js";
import { splitText } from "../../protocol/index.js";
import { commandFailed, formatChunk, parseIntOption } from "../helpers.js";

export function splitCommand(
  lines: string[],
  options: { maxPacketSize?: string }
): void {
  try {
    const config = new TransportConfig({
      maxPacketSize: parseIntOption("max-packet-size", options.maxPacketSize),
    });
    const chunks = splitText(lines.join("\n"), config.maxPacketSize);
    chunks.forEach((chunk, i) => {
      console.log(formatChunk(i, chunk));
    });
  } catch (err) {
    commandFailed(err);
  }
}
