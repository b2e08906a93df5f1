import type { Encoder } from '../types/index.js';
import { hexEncode } from '../util/bytes.js';
import { ByteTransform } from './ByteTransform.js';

class HexTransform extends ByteTransform {
  protected push(chunk: Uint8Array) { return hexEncode(chunk); }
  protected close() { return '\n'; }
}

export const hexEncoder: Encoder<'hex'> = {
  name: 'hex',
  description: 'lowercase hex digits on one line',
  createTransform: () => new HexTransform().toTransformStream(),
};
