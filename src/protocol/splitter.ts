/**
 * Newline-aware payload splitting under a datagram size ceiling.
 *
 * A batch of metric lines joined by `\n` is cut into chunks that each fit
 * in `limit` bytes, always on a line boundary. The newline used as a split
 * point is consumed. When no split point exists the remaining bytes go out
 * as one oversized chunk and the socket decides what to do with it.
 *
 * Chunks are `subarray` views over the input buffer; nothing is copied.
 */

import { NEWLINE, encodeUtf8 } from "./types.js";

/**
 * Find the rightmost newline that leaves a prefix of at most `limit` bytes.
 *
 * Scans `view[limit]` down to `view[1]`. Index 0 is excluded because it
 * would produce an empty prefix. Returns -1 when there is no split point.
 */
export function findSplitPoint(view: Uint8Array, limit: number): number {
  for (let i = Math.min(limit, view.length - 1); i > 0; i--) {
    if (view[i] === NEWLINE) {
      return i;
    }
  }
  return -1;
}

/**
 * Split `payload` into chunks no larger than `limit` where a newline allows.
 *
 * `limit <= 0` disables splitting. The result always has at least one
 * chunk, and joining the chunks with `\n` rebuilds the input.
 */
export function splitPayload(payload: Uint8Array, limit: number): Uint8Array[] {
  if (limit <= 0 || payload.length <= limit) {
    return [payload];
  }

  const chunks: Uint8Array[] = [];
  let rest = payload;
  while (rest.length > limit) {
    const at = findSplitPoint(rest, limit);
    if (at === -1) {
      // Oversized line: send it whole.
      break;
    }
    chunks.push(rest.subarray(0, at));
    rest = rest.subarray(at + 1);
    if (rest.length === 0) {
      return chunks;
    }
  }
  chunks.push(rest);
  return chunks;
}

/** Encode `text` as UTF-8 and split it. */
export function splitText(text: string, limit: number): Uint8Array[] {
  return splitPayload(encodeUtf8(text), limit);
}
