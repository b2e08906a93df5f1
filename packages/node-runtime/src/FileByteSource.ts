// packages/node-runtime/src/FileByteSource.ts
import { open, type FileHandle } from 'node:fs/promises';
import type { RandomAccessSource } from '../../core/src/types/index.js';
import { IOError, SeekError, asIOError } from '../../core/src/errors/index.js';
import { assertSliceBounds } from '../../core/src/util/range.js';

/**
 * Random-access source over an open file or device. Only the bytes of
 * each read() are held in memory.
 *
 * Character and block devices report no usable size, so their length
 * is `Infinity` and reads stop wherever the device runs dry.
 */
export class FileByteSource implements RandomAccessSource {
  private constructor(
    private readonly fd: FileHandle,
    readonly path: string,
    readonly length: number,
  ) {}

  static async open(path: string): Promise<FileByteSource> {
    let fd: FileHandle;
    try {
      fd = await open(path, 'r');
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new IOError(`could not open file, reason: ${msg}`, { cause: err });
    }

    try {
      const stats = await fd.stat();
      if (stats.isFile()) return new FileByteSource(fd, path, stats.size);
      if (stats.isCharacterDevice() || stats.isBlockDevice()) {
        return new FileByteSource(fd, path, Infinity);
      }
      throw new SeekError(`${path} cannot be seeked`);
    } catch (err) {
      await fd.close();
      throw asIOError(err, `could not stat ${path}`);
    }
  }

  async read(offset: number, len: number): Promise<Uint8Array> {
    assertSliceBounds(this.length, offset, len);
    const buf = new Uint8Array(len);
    let filled = 0;
    while (filled < len) {
      const { bytesRead } = await this.fd.read(buf, filled, len - filled, offset + filled);
      if (bytesRead === 0) break; // end of device, or the file shrank
      filled += bytesRead;
    }
    return filled === len ? buf : buf.slice(0, filled);
  }

  /** always call after finishing */
  async close(): Promise<void> {
    await this.fd.close();
  }
}
