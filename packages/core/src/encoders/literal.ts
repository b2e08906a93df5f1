// packages/core/src/encoders/literal.ts
import type { Encoder } from '../types/index.js';
import { concat, hexByte } from '../util/bytes.js';
import { quoteBytes } from '../escape/quote.js';
import { ByteTransform } from './ByteTransform.js';

/**
 * Holds the whole range and renders it once the input ends; both
 * literal forms need the complete content before writing anything.
 */
abstract class BufferingTransform extends ByteTransform {
  private readonly chunks: Uint8Array[] = [];

  protected push(chunk: Uint8Array) {
    this.chunks.push(chunk);
    return null;
  }

  protected close() {
    return this.render(concat(...this.chunks)) + '\n';
  }

  protected abstract render(all: Uint8Array): string;
}

export function formatArrayLiteral(bytes: Uint8Array): string {
  return '[' + Array.from(bytes, b => '0x' + hexByte(b)).join(', ') + ']';
}

class ArrayLiteralTransform extends BufferingTransform {
  protected render(all: Uint8Array) { return formatArrayLiteral(all); }
}

class StringLiteralTransform extends BufferingTransform {
  protected render(all: Uint8Array) { return quoteBytes(all); }
}

export const arrayLiteralEncoder: Encoder<'arrayLiteral'> = {
  name: 'arrayLiteral',
  description: 'array literal of 0x.. byte values',
  createTransform: () => new ArrayLiteralTransform().toTransformStream(),
};

export const stringLiteralEncoder: Encoder<'stringLiteral'> = {
  name: 'stringLiteral',
  description: 'quoted UTF-8 debug string',
  createTransform: () => new StringLiteralTransform().toTransformStream(),
};
