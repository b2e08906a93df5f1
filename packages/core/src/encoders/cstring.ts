// packages/core/src/encoders/cstring.ts
import type { Encoder, SplitState } from '../types/index.js';
import { PRINTABLE_FLOOR, hexEscape } from '../escape/classifier.js';
import { INITIAL_SPLIT_STATE, escapeBytes } from '../escape/splitter.js';
import { ByteTransform } from './ByteTransform.js';

/** Every byte as `\xhh`: verbose, never ambiguous */
export class CStringTransform extends ByteTransform {
  protected open() { return '"'; }
  protected push(chunk: Uint8Array) {
    let out = '';
    for (const b of chunk) out += hexEscape(b);
    return out;
  }
  protected close() { return '"\n'; }
}

/**
 * Shortest unambiguous literal: printable bytes stay literal, and the
 * literal is split after a `\x` escape whenever the next fragment is
 * not another one. The split state survives chunk boundaries.
 */
export class CStringSafeTransform extends ByteTransform {
  private state: SplitState = INITIAL_SPLIT_STATE;

  constructor(private readonly floor: number = PRINTABLE_FLOOR) {
    super();
  }

  protected open() { return '"'; }

  protected push(chunk: Uint8Array) {
    const run  = escapeBytes(this.state, chunk, this.floor);
    this.state = run.state;
    return run.text;
  }

  protected close() { return '"\n'; }
}

export const cstringEncoder: Encoder<'cstring'> = {
  name: 'cstring',
  description: 'C string literal, every byte as \\x escape',
  createTransform: () => new CStringTransform().toTransformStream(),
};

export const cstringSafeEncoder: Encoder<'cstringSafe'> = {
  name: 'cstringSafe',
  description: 'C string literal, split after \\x escapes to stay unambiguous',
  createTransform: () => new CStringSafeTransform().toTransformStream(),
};
