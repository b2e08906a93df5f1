// packages/core/src/util/ByteSource.ts
import { Blob } from 'node:buffer';
import type { RandomAccessSource } from '../types/index.js';
import { assertSliceBounds } from './range.js';

/**
 * In-memory random-access source over a Uint8Array or Blob.
 * Blob slices are read on-demand so large Blobs are never
 * materialised in full.
 */
export class ByteSource implements RandomAccessSource {
  constructor(private readonly src: Blob | Uint8Array) {}

  /** Total byte length of the underlying data */
  get length(): number {
    if (this.src instanceof Uint8Array) return this.src.byteLength;
    return this.src.size;
  }

  /**
   * Read a slice *[offset, offset + len)* as Uint8Array.
   * The returned view is a fresh copy — safe to mutate by caller.
   */
  async read(offset: number, len: number): Promise<Uint8Array> {
    assertSliceBounds(this.length, offset, len);

    if (this.src instanceof Uint8Array) {
      return this.src.slice(offset, offset + len);
    }

    const buf = await this.src.slice(offset, offset + len).arrayBuffer();
    return new Uint8Array(buf);
  }
}
