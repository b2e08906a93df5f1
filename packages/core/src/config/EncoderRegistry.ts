// packages/core/src/config/EncoderRegistry.ts
import type { Encoder } from '../types/index.js';
import { UnknownFormatError } from '../errors/index.js';
import { DEFAULT_FORMAT, FORMAT_NAMES, type FormatName } from './formats.js';
import { rawEncoder } from '../encoders/raw.js';
import { hexEncoder } from '../encoders/hex.js';
import { dumpEncoder } from '../encoders/dump.js';
import { arrayLiteralEncoder, stringLiteralEncoder } from '../encoders/literal.js';
import { cstringEncoder, cstringSafeEncoder } from '../encoders/cstring.js';
import { base64Encoder } from '../encoders/base64.js';
import { md5Encoder, sha256Encoder } from '../encoders/digest.js';

// keyed by every FormatName, so a missing encoder fails to compile
const ENCODERS: { readonly [N in FormatName]: Encoder<N> } = {
  raw          : rawEncoder,
  hex          : hexEncoder,
  dump         : dumpEncoder,
  arrayLiteral : arrayLiteralEncoder,
  stringLiteral: stringLiteralEncoder,
  cstring      : cstringEncoder,
  cstringSafe  : cstringSafeEncoder,
  base64       : base64Encoder,
  md5          : md5Encoder,
  sha256       : sha256Encoder,
};

export class EncoderRegistry {
  private static readonly byName: ReadonlyMap<string, Encoder> = new Map(
    FORMAT_NAMES.map((name): [string, Encoder] => [name, ENCODERS[name]]),
  );

  static has(name: string): name is FormatName {
    return this.byName.has(name);
  }

  static resolve(name: string): Encoder {
    const enc = this.byName.get(name);
    if (!enc) {
      throw new UnknownFormatError(
        `unsupported format "${name}", available: ${FORMAT_NAMES.join(', ')}`,
      );
    }
    return enc;
  }

  static get names(): readonly FormatName[] { return FORMAT_NAMES; }

  static get default(): Encoder { return this.resolve(DEFAULT_FORMAT); }
}
