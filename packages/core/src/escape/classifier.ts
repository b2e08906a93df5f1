// packages/core/src/escape/classifier.ts
import type { EscapeDecision } from '../types/index.js';
import { hexByte } from '../util/bytes.js';

/** Lowest byte rendered literally: the ASCII space */
export const PRINTABLE_FLOOR = 0x20;

/**
 * Floor used by the first releases of the tool (decimal 20, not 0x20):
 * bytes 0x14..0x1f came out as raw control characters. Only for callers
 * that must reproduce that output exactly.
 */
export const LEGACY_PRINTABLE_FLOOR = 0x14;

/** Highest byte rendered literally: `~` */
export const PRINTABLE_CEIL = 0x7e;

const CONTROL_ESCAPES: ReadonlyMap<number, string> = new Map([
  [0x07, '\\a'],
  [0x08, '\\b'],
  [0x0c, '\\f'],
  [0x0a, '\\n'],
  [0x0d, '\\r'],
  [0x09, '\\t'],
  [0x0b, '\\v'],
  [0x5c, '\\\\'],
  [0x22, '\\"'],
]);

export function hexEscape(b: number): string {
  return `\\x${hexByte(b)}`;
}

/**
 * Render one byte as a C string-literal fragment.
 */
export function classifyByte(b: number, floor: number = PRINTABLE_FLOOR): EscapeDecision {
  const escaped = CONTROL_ESCAPES.get(b);
  if (escaped !== undefined) return { text: escaped, isHexEscape: false };

  if (floor <= b && b <= PRINTABLE_CEIL) {
    return { text: String.fromCharCode(b), isHexEscape: false };
  }
  return { text: hexEscape(b), isHexEscape: true };
}
