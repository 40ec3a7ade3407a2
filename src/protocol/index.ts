/**
 * Protocol layer: constants, errors and the payload splitter.
 *
 * Nothing here touches the network.
 */

// Types
export {
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_MAX_PACKET_SIZE,
  HOST_ENV_VAR,
  PORT_ENV_VAR,
  NEWLINE,
  encodeUtf8,
} from "./types.js";

// Errors
export {
  StatsdError,
  AddressResolutionError,
  ConfigurationError,
  TransportError,
} from "./errors.js";

// Splitter
export { findSplitPoint, splitPayload, splitText } from "./splitter.js";
