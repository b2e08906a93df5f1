import type { Encoder } from '../types/index.js';
import { base64Encode, concat } from '../util/bytes.js';
import { ByteTransform } from './ByteTransform.js';

/** Encodes whole 3-byte groups as they arrive; the rest waits for the next chunk */
class Base64Transform extends ByteTransform {
  private pending = new Uint8Array(0);

  protected push(chunk: Uint8Array) {
    const data  = concat(this.pending, chunk);
    const whole = data.length - (data.length % 3);
    this.pending = data.slice(whole);
    return whole ? base64Encode(data.subarray(0, whole)) : null;
  }

  protected close() {
    const tail = this.pending.length ? base64Encode(this.pending) : '';
    this.pending = new Uint8Array(0);
    return tail + '\n';
  }
}

export const base64Encoder: Encoder<'base64'> = {
  name: 'base64',
  description: 'standard padded base64 on one line',
  createTransform: () => new Base64Transform().toTransformStream(),
};
