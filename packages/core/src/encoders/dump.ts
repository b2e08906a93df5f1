// packages/core/src/encoders/dump.ts
import type { Encoder } from '../types/index.js';
import { hexByte } from '../util/bytes.js';
import { ByteTransform } from './ByteTransform.js';

export const DUMP_WIDTH = 16;

function toChar(b: number): string {
  return b < 0x20 || b > 0x7e ? '.' : String.fromCharCode(b);
}

/**
 * Canonical hex dump, 16 bytes per line:
 *
 *   00000000  74 68 65 20 71 75 69 63  6b 20 62 72 6f 77 6e 20  |the quick brown |
 *
 * The offset counts from `offset`, by default the start of the dumped
 * range, and widens past 8 digits when it needs to. A short last
 * line is padded with spaces up to the ASCII column.
 */
export class HexDumpTransform extends ByteTransform {
  private used  = 0;
  private ascii = '';

  constructor(private offset = 0) {
    super();
  }

  protected push(chunk: Uint8Array) {
    let out = '';
    for (const b of chunk) {
      if (this.used === 0) {
        out += this.offset.toString(16).padStart(8, '0') + '  ';
      }
      out += hexByte(b) + ' ';
      out += this.gapAfter(this.used);
      this.ascii += toChar(b);
      this.used++;
      this.offset++;

      if (this.used === DUMP_WIDTH) {
        out += this.ascii + '|\n';
        this.used  = 0;
        this.ascii = '';
      }
    }
    return out;
  }

  protected close() {
    if (this.used === 0) return null;
    let out = '';
    for (let col = this.used; col < DUMP_WIDTH; col++) {
      out += '   ' + this.gapAfter(col);
    }
    out += this.ascii + '|\n';
    this.used  = 0;
    this.ascii = '';
    return out;
  }

  /** extra separator after column 8, opening bar after column 16 */
  private gapAfter(col: number): string {
    if (col === 7) return ' ';
    if (col === DUMP_WIDTH - 1) return ' |';
    return '';
  }
}

export const dumpEncoder: Encoder<'dump'> = {
  name: 'dump',
  description: 'canonical hex dump with ASCII column',
  createTransform: () => new HexDumpTransform().toTransformStream(),
};
