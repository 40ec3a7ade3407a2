/**
 * Abstract datagram transport.
 *
 * A transport owns one socket and one resolved endpoint for its whole life.
 * Senders hand it one chunk at a time; it never splits or buffers.
 */

import type { Endpoint } from "../resolver.js";

/** Completion callback for a single datagram. */
export type SendCallback = (err: Error | null) => void;

/** Receives errors nobody else is listening for. */
export type ErrorHandler = (err: Error) => void;

export abstract class TransportBase {
  /** Destination every datagram goes to. */
  abstract readonly endpoint: Endpoint;

  /** True once close() has run. */
  abstract readonly closed: boolean;

  /**
   * Send one datagram to the endpoint.
   *
   * Failures are reported through `callback` as a TransportError. An
   * implementation may also throw synchronously when the failure is known
   * before any I/O starts.
   */
  abstract sendTo(chunk: Uint8Array, callback: SendCallback): void;

  /** Report an error that has no callback to go to. */
  abstract reportError(err: Error): void;

  /** Release the socket. Calling it again is a no-op. */
  abstract close(): void;
}
