/**
 * Core constants and byte helpers.
 */

/** Default collector port. */
export const DEFAULT_PORT = 8125;

/** Default maximum datagram size in bytes. Zero disables splitting. */
export const DEFAULT_MAX_PACKET_SIZE = 8192;

/** Default collector host when neither option nor env var names one. */
export const DEFAULT_HOST = "localhost";

/** Environment variable naming the collector host. */
export const HOST_ENV_VAR = "DD_AGENT_HOST";

/** Environment variable naming the collector port. */
export const PORT_ENV_VAR = "DD_DOGSTATSD_PORT";

/** Byte used as the split point between batched lines. */
export const NEWLINE = 0x0a;

const encoder = new TextEncoder();

/** Encode a string as UTF-8 bytes. */
export function encodeUtf8(text: string): Uint8Array {
  return encoder.encode(text);
}
