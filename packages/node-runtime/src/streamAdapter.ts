import { Writable } from 'node:stream';
import type { WritableStream } from 'node:stream/web';

/** Wrap a Node writable (stdout, a file) as a WHATWG sink */
export function toWebWritable(w: Writable): WritableStream<Uint8Array> {
  return Writable.toWeb(w);
}
