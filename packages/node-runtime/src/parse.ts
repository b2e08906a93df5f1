// packages/node-runtime/src/parse.ts
import { ArgumentError } from '../../core/src/errors/index.js';
import { UNBOUNDED } from '../../core/src/config/formats.js';

const INTEGER    = /^\+?(0[xX][0-9a-fA-F]+|0[oO][0-7]+|0[bB][01]+|0|[1-9][0-9]*)$/;
const BARE_OCTAL = /^\+?0([0-7]+)$/;

/**
 * Parse a byte count: decimal, `0x` hex, `0o` or leading-`0` octal,
 * `0b` binary. `010` is 8.
 */
export function parseByteCount(raw: string, what: string): number {
  const text  = raw.trim();
  const octal = BARE_OCTAL.exec(text);
  const n = octal !== null
    ? parseInt(octal[1], 8)
    : INTEGER.test(text) ? Number(text.replace(/^\+/, '')) : NaN;
  if (!Number.isSafeInteger(n)) {
    throw new ArgumentError(`could not parse ${what} "${raw}"`);
  }
  return n;
}

export function parseOffset(raw: string): number {
  return parseByteCount(raw, 'offset');
}

/** Like parseByteCount, but `-1` means "to the end of the file" */
export function parseSize(raw: string): number {
  if (raw.trim() === String(UNBOUNDED)) return UNBOUNDED;
  return parseByteCount(raw, 'size');
}
