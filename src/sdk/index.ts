/**
 * statsd-datagram SDK.
 */

export { StatsdTransport, type StatsdTransportOptions } from "./client.js";
export { TransportConfig, type TransportConfigOptions } from "./config.js";
export {
  EndpointResolver,
  DnsEndpointResolver,
  createEndpoint,
  pickIpv4,
  type Endpoint,
  type LookupAll,
} from "./resolver.js";
export { DatagramSender } from "./sender.js";
export {
  TransportBase,
  UdpTransport,
  type SendCallback,
  type ErrorHandler,
  type UdpTransportOptions,
} from "./transport/index.js";
