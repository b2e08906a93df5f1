import type { ReadableStream } from 'node:stream/web';
import { concat } from './bytes.js';

export async function collectStream(
  rs: ReadableStream<Uint8Array>,
): Promise<Uint8Array> {
  const reader = rs.getReader();
  const chunks: Uint8Array[] = [];
  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }
  return concat(...chunks);
}
