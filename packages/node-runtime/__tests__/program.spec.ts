import { CommanderError } from 'commander';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { createProgram } from '../src/program.js';
import {
  ArgumentError,
  IOError,
  SeekError,
  UnknownFormatError,
} from '../../core/src/errors/index.js';
import { capture, makeFixtures } from './_fixtures.js';

describe('byteslice program (in-process)', () => {
  let fx: Awaited<ReturnType<typeof makeFixtures>>;

  beforeAll(async () => { fx = await makeFixtures(); });
  afterAll(() => fx.remove());

  function run(args: string[]) {
    const out = capture();
    const err = capture();
    const done = createProgram({ stdout: out.stream, stderr: err.stream })
      .parseAsync(args, { from: 'user' });
    return { out, err, done };
  }

  it('prints the selected range in the selected format', async () => {
    const { out, done } = run(['-o', '5', '-s', '3', '-f', 'hex', fx.ten]);
    await done;
    expect(out.text()).toBe('050607\n');
  });

  it('defaults to the whole file, raw', async () => {
    const { out, done } = run([fx.ten]);
    await done;
    expect(out.bytes()).toEqual(Uint8Array.from({ length: 10 }, (_, i) => i));
  });

  it('accepts --length as an alias of --size, and hex numbers', async () => {
    const { out, done } = run(['--offset', '0x8', '--length', '2', '--format', 'arrayLiteral', fx.ten]);
    await done;
    expect(out.text()).toBe('[0x08, 0x09]\n');
  });

  it('splits the C literal after a hex escape', async () => {
    const { out, done } = run(['-f', 'cstringSafe', fx.ab]);
    await done;
    expect(out.text()).toBe('"\\xab" "a"\n');
  });

  it.runIf(existsSync('/dev/zero'))('reads a bounded range from a device', async () => {
    const { out, done } = run(['-o', '0x1000', '-s', '4', '-f', 'hex', '/dev/zero']);
    await done;
    expect(out.text()).toBe('00000000\n');
  });

  it('requires exactly one file', async () => {
    await expect(run([]).done).rejects.toThrow(ArgumentError);
    await expect(run([fx.ten, fx.ab]).done).rejects.toThrow('expected exactly one argument, got 2');
  });

  it('rejects an unknown format', async () => {
    await expect(run(['-f', 'nope', fx.ten]).done).rejects.toThrow(UnknownFormatError);
  });

  it('rejects a malformed offset', async () => {
    await expect(run(['-o', 'zz', fx.ten]).done).rejects.toThrow(ArgumentError);
  });

  it('rejects an offset past the end of the file', async () => {
    await expect(run(['-o', '11', fx.ten]).done).rejects.toThrow(SeekError);
  });

  it('reports a missing file', async () => {
    await expect(run([join(fx.dir, 'nope.bin')]).done).rejects.toThrow(IOError);
  });

  it('logs to stderr with -v, never to stdout', async () => {
    const { out, err, done } = run(['-v', '-f', 'md5', fx.ten]);
    await done;
    expect(out.text()).toBe('c56bd5480f6e5413cb62a0ad9666613a\n');
    expect(err.text()).toBe('1| byteslice:slicer: md5: read 10 bytes\n');
  });

  it('writes help to stderr and lists every format', async () => {
    const { out, err, done } = run(['--help']);
    await expect(done).rejects.toBeInstanceOf(CommanderError);
    expect(out.text()).toBe('');
    expect(err.text()).toContain('Usage: byteslice [options] FILE');
    expect(err.text()).toContain('cstringSafe');
  });
});
