/**
 * UDP transport on node:dgram.
 *
 * The endpoint is resolved before the socket is created, so an address
 * failure and a socket failure are separate steps.
 */

import dgram from "node:dgram";

import { TransportError } from "../../protocol/index.js";
import type { Endpoint } from "../resolver.js";
import { TransportBase, type ErrorHandler, type SendCallback } from "./base.js";

export interface UdpTransportOptions {
  /**
   * Called for socket errors that are not tied to a send callback, and for
   * failed fire-and-forget sends. Without one the error is rethrown, so
   * an unhandled failure surfaces as an uncaught exception the same way an
   * unhandled dgram `error` event does.
   */
  onError?: ErrorHandler;
}

function describe(endpoint: Endpoint): string {
  return `${endpoint.address}:${endpoint.port}`;
}

function rethrow(err: Error): never {
  throw err;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class UdpTransport extends TransportBase {
  readonly endpoint: Endpoint;

  private _socket: dgram.Socket;
  private _closed: boolean = false;
  private _onError: ErrorHandler;

  private constructor(endpoint: Endpoint, socket: dgram.Socket, onError: ErrorHandler) {
    super();
    this.endpoint = endpoint;
    this._socket = socket;
    this._onError = onError;

    this._socket.on("error", (err) => {
      this._onError(
        new TransportError(`UDP socket error (${describe(this.endpoint)}): ${err.message}`, err)
      );
    });
  }

  /**
   * Open a `udp4` socket aimed at an already-resolved endpoint.
   */
  static open(endpoint: Endpoint, options: UdpTransportOptions = {}): UdpTransport {
    const onError = options.onError ?? rethrow;

    let socket: dgram.Socket;
    try {
      socket = dgram.createSocket("udp4");
    } catch (err) {
      throw new TransportError(
        `Could not open UDP socket: ${toError(err).message}`,
        err
      );
    }
    return new UdpTransport(endpoint, socket, onError);
  }

  get closed(): boolean {
    return this._closed;
  }

  sendTo(chunk: Uint8Array, callback: SendCallback): void {
    if (this._closed) {
      throw new TransportError("transport is closed");
    }

    const target = describe(this.endpoint);
    try {
      this._socket.send(
        chunk,
        0,
        chunk.length,
        this.endpoint.port,
        this.endpoint.address,
        (err) => {
          if (err) {
            callback(
              new TransportError(
                `UDP send of ${chunk.length} byte(s) to ${target} failed: ${err.message}`,
                err
              )
            );
          } else {
            callback(null);
          }
        }
      );
    } catch (err) {
      throw new TransportError(
        `UDP send of ${chunk.length} byte(s) to ${target} failed: ${toError(err).message}`,
        err
      );
    }
  }

  reportError(err: Error): void {
    this._onError(err);
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this._socket.close();
  }
}
