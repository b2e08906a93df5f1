// packages/core/src/escape/quote.ts
import { hexByte } from '../util/bytes.js';

/** `rune === -1` marks a byte that does not start a valid UTF-8 sequence */
interface DecodedRune {
  rune: number;
  size: number;
}

const INVALID = -1;

const PRINTABLE_RUNE = /^[\p{L}\p{M}\p{N}\p{P}\p{S}]$/u;

const NAMED_ESCAPES: ReadonlyMap<number, string> = new Map([
  [0x07, '\\a'],
  [0x08, '\\b'],
  [0x0c, '\\f'],
  [0x0a, '\\n'],
  [0x0d, '\\r'],
  [0x09, '\\t'],
  [0x0b, '\\v'],
]);

function isContinuation(b: number | undefined, lo = 0x80, hi = 0xbf): b is number {
  return b !== undefined && b >= lo && b <= hi;
}

/**
 * Decode the rune at `i`. Overlong forms, surrogates and values past
 * U+10FFFF are rejected; a rejected byte is consumed on its own.
 */
export function decodeRune(bytes: Uint8Array, i: number): DecodedRune {
  const b0 = bytes[i];
  if (b0 < 0x80) return { rune: b0, size: 1 };

  const b1 = bytes[i + 1];
  if (b0 >= 0xc2 && b0 <= 0xdf) {
    if (!isContinuation(b1)) return { rune: INVALID, size: 1 };
    return { rune: ((b0 & 0x1f) << 6) | (b1 & 0x3f), size: 2 };
  }

  const b2 = bytes[i + 2];
  if (b0 >= 0xe0 && b0 <= 0xef) {
    const lo = b0 === 0xe0 ? 0xa0 : 0x80;
    const hi = b0 === 0xed ? 0x9f : 0xbf;
    if (!isContinuation(b1, lo, hi) || !isContinuation(b2)) return { rune: INVALID, size: 1 };
    return { rune: ((b0 & 0x0f) << 12) | ((b1 & 0x3f) << 6) | (b2 & 0x3f), size: 3 };
  }

  const b3 = bytes[i + 3];
  if (b0 >= 0xf0 && b0 <= 0xf4) {
    const lo = b0 === 0xf0 ? 0x90 : 0x80;
    const hi = b0 === 0xf4 ? 0x8f : 0xbf;
    if (!isContinuation(b1, lo, hi) || !isContinuation(b2) || !isContinuation(b3)) {
      return { rune: INVALID, size: 1 };
    }
    return {
      rune: ((b0 & 0x07) << 18) | ((b1 & 0x3f) << 12) | ((b2 & 0x3f) << 6) | (b3 & 0x3f),
      size: 4,
    };
  }

  return { rune: INVALID, size: 1 };
}

export function isPrintableRune(rune: number): boolean {
  if (rune < 0x80) return rune >= 0x20 && rune < 0x7f;
  return PRINTABLE_RUNE.test(String.fromCodePoint(rune));
}

function escapeRune(rune: number): string {
  if (rune === 0x22 || rune === 0x5c) return '\\' + String.fromCharCode(rune);
  if (isPrintableRune(rune)) return String.fromCodePoint(rune);

  const named = NAMED_ESCAPES.get(rune);
  if (named !== undefined) return named;

  if (rune < 0x20 || rune === 0x7f) return `\\x${hexByte(rune)}`;
  if (rune < 0x10000) return `\\u${rune.toString(16).padStart(4, '0')}`;
  return `\\U${rune.toString(16).padStart(8, '0')}`;
}

/**
 * Double-quoted debug representation of `bytes` read as UTF-8 text.
 * Bytes outside any valid sequence come out as `\xhh`, so every input
 * has exactly one rendering and can be read back.
 */
export function quoteBytes(bytes: Uint8Array): string {
  let out = '"';
  for (let i = 0; i < bytes.length; ) {
    const { rune, size } = decodeRune(bytes, i);
    out += rune === INVALID ? `\\x${hexByte(bytes[i])}` : escapeRune(rune);
    i += size;
  }
  return out + '"';
}
