/**
 * statsd-datagram transport layer.
 */

export { TransportBase, type SendCallback, type ErrorHandler } from "./base.js";
export { UdpTransport, type UdpTransportOptions } from "./udp.js";
