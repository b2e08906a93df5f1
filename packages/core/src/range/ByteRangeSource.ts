// packages/core/src/range/ByteRangeSource.ts
import { ReadableStream } from 'node:stream/web';
import type { ByteRange, RandomAccessSource } from '../types/index.js';
import { ArgumentError, SeekError, asIOError } from '../errors/index.js';
import { UNBOUNDED } from '../config/formats.js';

export function assertByteRange(range: ByteRange): void {
  if (!Number.isSafeInteger(range.offset) || range.offset < 0) {
    throw new ArgumentError(`offset must be a non-negative integer, got ${range.offset}`);
  }
  if (!Number.isSafeInteger(range.length) || range.length < UNBOUNDED) {
    throw new ArgumentError(`length must be ${UNBOUNDED} or a non-negative integer, got ${range.length}`);
  }
}

/**
 * Bounded, forward-only view of a random-access source.
 *
 * Reads never hand out more than `range.length` bytes in total, and
 * once the bound (or the end of the source) is reached the source is
 * not touched again.
 */
export class ByteRangeSource {
  private position : number;
  private remaining: number;
  private taken = 0;

  private constructor(
    private readonly src: RandomAccessSource,
    readonly range: ByteRange,
  ) {
    this.position  = range.offset;
    this.remaining = range.length === UNBOUNDED ? Infinity : range.length;
  }

  static open(src: RandomAccessSource, range: ByteRange): ByteRangeSource {
    assertByteRange(range);
    if (range.offset > src.length) {
      throw new SeekError(
        `could not seek to offset 0x${range.offset.toString(16).toUpperCase()}, ` +
        `source is only ${src.length} bytes`,
      );
    }
    return new ByteRangeSource(src, range);
  }

  /** bytes handed out so far */
  get delivered(): number { return this.taken; }

  /**
   * Next chunk of at most `max` bytes, or `null` at end-of-stream.
   */
  async read(max: number): Promise<Uint8Array | null> {
    const n = Math.min(max, this.remaining, this.src.length - this.position);
    if (n <= 0) return null;

    let bytes: Uint8Array;
    try {
      bytes = await this.src.read(this.position, n);
    } catch (err) {
      throw asIOError(err, `read of ${n} bytes at offset ${this.position} failed`);
    }
    if (bytes.byteLength === 0) {
      this.remaining = 0;
      return null;
    }

    this.position  += bytes.byteLength;
    this.remaining -= bytes.byteLength;
    this.taken     += bytes.byteLength;
    return bytes;
  }

  /**
   * Pull-based stream; each pull is a single bounded read, nothing is
   * read ahead of the consumer.
   */
  toReadableStream(chunkSize: number): ReadableStream<Uint8Array> {
    return new ReadableStream<Uint8Array>(
      {
        pull: async ctl => {
          const chunk = await this.read(chunkSize);
          if (chunk === null) ctl.close();
          else ctl.enqueue(chunk);
        },
      },
      { highWaterMark: 0 },
    );
  }
}
