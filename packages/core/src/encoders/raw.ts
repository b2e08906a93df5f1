import type { Encoder } from '../types/index.js';
import { ByteTransform } from './ByteTransform.js';

class RawTransform extends ByteTransform {
  protected push(chunk: Uint8Array) { return chunk; }
}

export const rawEncoder: Encoder<'raw'> = {
  name: 'raw',
  description: 'bytes unchanged',
  createTransform: () => new RawTransform().toTransformStream(),
};
