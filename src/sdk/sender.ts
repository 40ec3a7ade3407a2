/**
 * Datagram sender: the callback path and the promise path.
 *
 * Both encode the text as UTF-8, run the same splitter, and issue chunk
 * sends strictly in order, stopping at the first failure. They differ only
 * in how completion is reported.
 */

import { splitText } from "../protocol/index.js";
import type { SendCallback, TransportBase } from "./transport/base.js";

export class DatagramSender {
  private _transport: TransportBase;
  private _maxPacketSize: number;

  constructor(transport: TransportBase, maxPacketSize: number) {
    this._transport = transport;
    this._maxPacketSize = maxPacketSize;
  }

  get maxPacketSize(): number {
    return this._maxPacketSize;
  }

  /**
   * Send `text`, issuing each chunk from the completion of the previous one.
   *
   * Failures go to `callback` when given. Without one, a failure raised
   * before any I/O is thrown and a socket failure goes to the transport's
   * error handler, which rethrows unless the caller installed one.
   */
  send(text: string, callback?: SendCallback): void {
    const chunks = splitText(text, this._maxPacketSize);
    const done: SendCallback =
      callback ??
      ((err) => {
        if (err) this._transport.reportError(err);
      });

    let index = 0;
    let synchronous = true;
    const next = (err: Error | null): void => {
      if (err) {
        done(err);
        return;
      }
      if (index === chunks.length) {
        done(null);
        return;
      }
      const chunk = chunks[index++];
      try {
        this._transport.sendTo(chunk, next);
      } catch (thrown) {
        const error = thrown instanceof Error ? thrown : new Error(String(thrown));
        if (!callback && synchronous) throw error;
        done(error);
      }
    };
    next(null);
    synchronous = false;
  }

  /**
   * Send `text`, awaiting each chunk before issuing the next.
   *
   * Resolves with the number of datagrams sent once the last one is out;
   * rejects with the first failure.
   */
  async sendAsync(text: string): Promise<number> {
    const chunks = splitText(text, this._maxPacketSize);
    for (const chunk of chunks) {
      await new Promise<void>((resolve, reject) => {
        this._transport.sendTo(chunk, (err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    }
    return chunks.length;
  }
}
