import { EncoderRegistry } from '../src/config/EncoderRegistry.js';
import { FORMAT_NAMES } from '../src/config/formats.js';
import { hexEncoder } from '../src/encoders/hex.js';
import { UnknownFormatError } from '../src/errors/index.js';

describe('EncoderRegistry', () => {
  it('resolves a registered format', () => {
    expect(EncoderRegistry.resolve('hex')).toBe(hexEncoder);
  });

  it('throws on an unknown format and lists the choices', () => {
    expect(() => EncoderRegistry.resolve('nope')).toThrow(UnknownFormatError);
    expect(() => EncoderRegistry.resolve('nope')).toThrow(
      'unsupported format "nope", available: raw, hex, dump, arrayLiteral, stringLiteral, cstring, cstringSafe, base64, md5, sha256',
    );
  });

  it('is case sensitive', () => {
    expect(() => EncoderRegistry.resolve('HEX')).toThrow(UnknownFormatError);
  });

  it('registers exactly the ten formats under their own names', () => {
    expect(EncoderRegistry.names).toEqual([
      'raw', 'hex', 'dump', 'arrayLiteral', 'stringLiteral',
      'cstring', 'cstringSafe', 'base64', 'md5', 'sha256',
    ]);
    for (const name of FORMAT_NAMES) {
      expect(EncoderRegistry.resolve(name).name).toBe(name);
      expect(EncoderRegistry.has(name)).toBe(true);
    }
    expect(EncoderRegistry.has('cstring_unsafe')).toBe(false);
  });

  it('defaults to raw', () => {
    expect(EncoderRegistry.default.name).toBe('raw');
  });

  it('hands out a fresh transform per run', () => {
    const enc = EncoderRegistry.resolve('sha256');
    expect(enc.createTransform()).not.toBe(enc.createTransform());
  });
});
