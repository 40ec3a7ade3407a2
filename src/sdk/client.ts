/**
 * StatsdTransport -- the primary SDK interface.
 *
 * Resolves the destination once, opens a UDP socket aimed at it, and sends
 * newline-joined metric batches under the configured datagram size.
 */

import { TransportConfig, type TransportConfigOptions } from "./config.js";
import { DnsEndpointResolver, type Endpoint, type EndpointResolver } from "./resolver.js";
import { DatagramSender } from "./sender.js";
import type { ErrorHandler, SendCallback, TransportBase } from "./transport/base.js";
import { UdpTransport } from "./transport/udp.js";

export interface StatsdTransportOptions extends TransportConfigOptions {
  /** Resolver used for the destination name. */
  resolver?: EndpointResolver;
  /** Handler for socket errors with no callback to report to. */
  onError?: ErrorHandler;
}

export class StatsdTransport {
  /** @internal */
  readonly _transport: TransportBase;
  /** @internal */
  readonly _sender: DatagramSender;

  /**
   * Wrap an open transport. Use StatsdTransport.open() unless a custom
   * TransportBase is needed.
   */
  constructor(transport: TransportBase, maxPacketSize: number) {
    this._transport = transport;
    this._sender = new DatagramSender(transport, maxPacketSize);
  }

  /**
   * Read configuration, resolve the endpoint and open the socket.
   *
   * Rejects with ConfigurationError or AddressResolutionError before any
   * socket is created.
   */
  static async open(options: StatsdTransportOptions = {}): Promise<StatsdTransport> {
    const config = new TransportConfig(options);
    const resolver = options.resolver ?? new DnsEndpointResolver();
    const endpoint = await resolver.resolve(config.host, config.port);
    const transport = UdpTransport.open(endpoint, { onError: options.onError });
    return new StatsdTransport(transport, config.maxPacketSize);
  }

  get endpoint(): Endpoint {
    return this._transport.endpoint;
  }

  get maxPacketSize(): number {
    return this._sender.maxPacketSize;
  }

  get closed(): boolean {
    return this._transport.closed;
  }

  /** Send a metric batch; see DatagramSender.send. */
  send(text: string, callback?: SendCallback): void {
    this._sender.send(text, callback);
  }

  /** Send a metric batch and wait for every chunk; resolves to the datagram count. */
  sendAsync(text: string): Promise<number> {
    return this._sender.sendAsync(text);
  }

  /** Close the socket. No sends are allowed afterwards. */
  close(): void {
    this._transport.close();
  }
}
