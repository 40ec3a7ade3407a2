/**
 * statsd-datagram CLI -- send metric lines to a StatsD collector over UDP.
 */

import { Command } from "commander";

import { sendCommand } from "./commands/send.js";
import { splitCommand } from "./commands/split.js";
import { resolveCommand } from "./commands/resolve.js";
import { commandFailed } from "./helpers.js";

interface SendOptions {
  host?: string;
  port?: string;
  maxPacketSize?: string;
}

const program = new Command();

program
  .name("statsd-datagram")
  .description("Send metric lines to a StatsD collector over UDP")
  .version("0.1.0");

// ---- send ------------------------------------------------------------------
program
  .command("send <lines...>")
  .description("Send metric lines as one newline-joined batch")
  .option("-H, --host <host>", "Collector host (default: $DD_AGENT_HOST or localhost)")
  .option("-p, --port <port>", "Collector port (default: $DD_DOGSTATSD_PORT or 8125)")
  .option("-m, --max-packet-size <bytes>", "Maximum datagram size, 0 for no limit (default: 8192)")
  .action(async (lines: string[], opts: SendOptions) => {
    await sendCommand(lines, opts);
  });

// ---- split -----------------------------------------------------------------
program
  .command("split <lines...>")
  .description("Print the datagrams a batch would be split into (offline)")
  .option("-m, --max-packet-size <bytes>", "Maximum datagram size, 0 for no limit (default: 8192)")
  .action((lines: string[], opts: { maxPacketSize?: string }) => {
    splitCommand(lines, opts);
  });

// ---- resolve ---------------------------------------------------------------
program
  .command("resolve [host]")
  .description("Print the IPv4 endpoint a collector host resolves to")
  .option("-p, --port <port>", "Collector port (default: $DD_DOGSTATSD_PORT or 8125)")
  .action(async (host: string | undefined, opts: { port?: string }) => {
    await resolveCommand(host, opts);
  });

program.parseAsync(process.argv).catch(commandFailed);
