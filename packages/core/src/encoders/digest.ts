// packages/core/src/encoders/digest.ts
import { createHash, type Hash } from 'node:crypto';
import type { Encoder } from '../types/index.js';
import { ByteTransform } from './ByteTransform.js';

export type DigestAlgorithm = 'md5' | 'sha256';

/** Nothing is written until the input ends and the digest is final */
export class DigestTransform extends ByteTransform {
  private readonly hash: Hash;

  constructor(algorithm: DigestAlgorithm) {
    super();
    this.hash = createHash(algorithm);
  }

  protected push(chunk: Uint8Array) {
    this.hash.update(chunk);
    return null;
  }

  protected close() {
    return this.hash.digest('hex') + '\n';
  }
}

export const md5Encoder: Encoder<'md5'> = {
  name: 'md5',
  description: 'MD5 digest as hex',
  createTransform: () => new DigestTransform('md5').toTransformStream(),
};

export const sha256Encoder: Encoder<'sha256'> = {
  name: 'sha256',
  description: 'SHA-256 digest as hex',
  createTransform: () => new DigestTransform('sha256').toTransformStream(),
};
