// packages/core/src/util/Convertible.ts
import { base64Encode, hexEncode } from './bytes.js';

/**
 * Encoder output with several views over the same bytes.
 * String(result) yields the text view.
 */
export class ConvertibleOutput {
  constructor(private readonly bytes: Uint8Array) {}

  /** Raw bytes view (do NOT mutate). */
  get uint8array(): Uint8Array {
    return this.bytes;
  }

  get byteLength(): number {
    return this.bytes.byteLength;
  }

  /** UTF-8 decoded string; every text format is ASCII or UTF-8. */
  get text(): string {
    return new TextDecoder().decode(this.bytes);
  }

  /** Hex view, handy for binary formats such as raw. */
  get hex(): string {
    return hexEncode(this.bytes);
  }

  get base64(): string {
    return base64Encode(this.bytes);
  }

  toString(): string { return this.text; }
}
