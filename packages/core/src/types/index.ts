import type { TransformStream } from 'node:stream/web';
import type { FormatName } from '../config/formats.js';

/* ------------------------- Byte ranges -------------------------------- */

/**
 * Contiguous slice of a source. `length = -1` reads to the end.
 */
export interface ByteRange {
  readonly offset: number;
  readonly length: number;
}

/**
 * Seekable underlying data: fixed length, random-access reads.
 */
export interface RandomAccessSource {
  /** total length in bytes, `Infinity` when the size is unknown */
  readonly length: number;
  /**
   * return a copy of bytes `[offset, offset + len)`
   * throws if the range is out of bounds
   */
  read(offset: number, len: number): Promise<Uint8Array>;
}

/* ------------------------- Encoders ----------------------------------- */

export interface Encoder<N extends FormatName = FormatName> {
  readonly name: N;
  /** one-line summary shown in CLI help */
  readonly description: string;
  /** fresh transform holding only this run's state */
  createTransform(): TransformStream<Uint8Array, Uint8Array>;
}

/* ------------------------- Escaping ----------------------------------- */

/** Rendering of one byte inside a C string literal */
export interface EscapeDecision {
  readonly text: string;
  readonly isHexEscape: boolean;
}

/** State carried between fragments by the ambiguity-safe escaper */
export interface SplitState {
  readonly lastWasHexEscape: boolean;
}
