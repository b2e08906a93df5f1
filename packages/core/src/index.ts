// packages/core/src/index.ts
import type { Blob } from 'node:buffer';
import type { ReadableStream, WritableStream } from 'node:stream/web';

import { EncoderRegistry } from './config/EncoderRegistry.js';
import { DEFAULT_CHUNK_SIZE, UNBOUNDED, type FormatName } from './config/formats.js';
import { ByteRangeSource } from './range/ByteRangeSource.js';
import { ByteSource } from './util/ByteSource.js';
import { ConvertibleOutput } from './util/Convertible.js';
import { collectStream } from './util/stream.js';
import { createLogger, type Logger, type Verbosity } from './util/logger.js';
import { ArgumentError, asIOError } from './errors/index.js';
import type { ByteRange, Encoder, RandomAccessSource } from './types/index.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring ByteSlicer behaviour.
 */
export interface SlicerOptions {
  /** Bytes requested from the source per read; defaults to 32 KiB */
  chunkSize? : number;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?   : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?    : (msg: string) => void;
}

/**
 * Outcome of a successful extraction.
 */
export interface ExtractSummary {
  format    : FormatName;
  offset    : number;
  /** requested length, -1 when unbounded */
  length    : number;
  /** bytes actually read from the source */
  bytesRead : number;
}

export const WHOLE_SOURCE: ByteRange = { offset: 0, length: UNBOUNDED };

/**
 * Reads a byte range from a source and renders it through one encoder.
 */
export class ByteSlicer {
  private readonly chunkSize : number;
  private readonly log       : Logger;

  constructor(opt: SlicerOptions = {}) {
    const chunkSize = opt.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
      throw new ArgumentError(`chunk size must be a positive integer, got ${chunkSize}`);
    }
    this.chunkSize = chunkSize;
    this.log       = createLogger(opt.verbose ?? 0, opt.logger).child('slicer');
  }

  /**
   * Stream `range` of `source` through the `format` encoder into `sink`.
   *
   * The sink is neither closed nor aborted; it belongs to the caller.
   * Output written before a failure stays written.
   */
  async extract(
    source : RandomAccessSource,
    range  : ByteRange,
    format : string,
    sink   : WritableStream<Uint8Array>,
  ): Promise<ExtractSummary> {
    const encoder = EncoderRegistry.resolve(format);
    const input   = ByteRangeSource.open(source, range);

    this.log.log(2, `format=${encoder.name} offset=${range.offset} length=${range.length} source=${Number.isFinite(source.length) ? `${source.length}B` : 'device'}`);

    try {
      await this.pipe(input, encoder).pipeTo(sink, { preventClose: true, preventAbort: true });
    } catch (err) {
      throw asIOError(err, 'an error occurred while encoding');
    }

    this.log.log(1, `${encoder.name}: read ${input.delivered} bytes`);
    return {
      format   : encoder.name,
      offset   : range.offset,
      length   : range.length,
      bytesRead: input.delivered,
    };
  }

  /**
   * Encode in-memory data; convenient for tests and embedding.
   */
  async encode(
    data   : Uint8Array | Blob,
    format : string,
    range  : ByteRange = WHOLE_SOURCE,
  ): Promise<ConvertibleOutput> {
    const encoder = EncoderRegistry.resolve(format);
    const input   = ByteRangeSource.open(new ByteSource(data), range);
    try {
      return new ConvertibleOutput(await collectStream(this.pipe(input, encoder)));
    } catch (err) {
      throw asIOError(err, 'an error occurred while encoding');
    }
  }

  private pipe(input: ByteRangeSource, encoder: Encoder): ReadableStream<Uint8Array> {
    this.log.log(3, `reading in chunks of ${this.chunkSize} bytes`);
    return input.toReadableStream(this.chunkSize).pipeThrough(encoder.createTransform());
  }
}

export { EncoderRegistry } from './config/EncoderRegistry.js';
export { FORMAT_NAMES, DEFAULT_FORMAT, UNBOUNDED, type FormatName } from './config/formats.js';
export { ByteRangeSource } from './range/ByteRangeSource.js';
export { ByteSource } from './util/ByteSource.js';
export { ConvertibleOutput } from './util/Convertible.js';
export { createLogger, toVerbosity, type Logger, type Verbosity } from './util/logger.js';
export {
  classifyByte,
  PRINTABLE_FLOOR,
  LEGACY_PRINTABLE_FLOOR,
} from './escape/classifier.js';
export { escapeBytes, stepFragment, INITIAL_SPLIT_STATE, SEGMENT_BREAK } from './escape/splitter.js';
export { quoteBytes } from './escape/quote.js';
export { CStringSafeTransform } from './encoders/cstring.js';
export * from './errors/index.js';
export type * from './types/index.js';
