// packages/node-runtime/src/index.ts
import { ByteSlicer, type SlicerOptions } from '../../core/src/index.js';

export function createSlicer(cfg?: SlicerOptions): ByteSlicer {
  return new ByteSlicer(cfg);
}

export * from '../../core/src/index.js';
export { FileByteSource } from './FileByteSource.js';
export { parseOffset, parseSize } from './parse.js';
