// packages/core/src/encoders/ByteTransform.ts
import { TransformStream, type TransformStreamDefaultController } from 'node:stream/web';
import { textBytes } from '../util/bytes.js';

/** What a transform step hands back: bytes, text to encode, or nothing */
export type Emission = Uint8Array | string | null;

/**
 * Per-run state machine behind every encoder:
 *   • open()  – preamble, before the first chunk
 *   • push()  – one input chunk
 *   • close() – trailer, after the last chunk
 */
export abstract class ByteTransform {
  protected open(): Emission { return null; }
  protected abstract push(chunk: Uint8Array): Emission;
  protected close(): Emission { return null; }

  toTransformStream(): TransformStream<Uint8Array, Uint8Array> {
    return new TransformStream<Uint8Array, Uint8Array>({
      start    : ctl => emit(ctl, this.open()),
      transform: (chunk, ctl) => emit(ctl, this.push(chunk)),
      flush    : ctl => emit(ctl, this.close()),
    });
  }
}

function emit(
  ctl: TransformStreamDefaultController<Uint8Array>,
  out: Emission,
): void {
  if (out === null) return;
  const bytes = typeof out === 'string' ? textBytes(out) : out;
  if (bytes.byteLength) ctl.enqueue(bytes);
}
