/**
 * statsd-datagram -- metric lines over UDP.
 *
 * Top-level package exports: StatsdTransport, the SDK building blocks, protocol.
 */

export * from "./sdk/index.js";
export * as protocol from "./protocol/index.js";
export {
  StatsdError,
  AddressResolutionError,
  ConfigurationError,
  TransportError,
} from "./protocol/index.js";
