// packages/node-runtime/src/program.ts
import { Command, Option } from 'commander';
import { stdout, stderr } from 'node:process';
import type { Writable } from 'node:stream';

import { ArgumentError } from '../../core/src/errors/index.js';
import { EncoderRegistry } from '../../core/src/config/EncoderRegistry.js';
import { DEFAULT_FORMAT, FORMAT_NAMES, UNBOUNDED } from '../../core/src/config/formats.js';
import { toVerbosity } from '../../core/src/util/logger.js';
import { FileByteSource } from './FileByteSource.js';
import { createSlicer } from './index.js';
import { parseOffset, parseSize } from './parse.js';
import { toWebWritable } from './streamAdapter.js';

const PKG_VERSION = '1.0.0'; // sync with root package.json

/** Where encoded output and diagnostics go */
export interface CliIO {
  stdout: Writable;
  stderr: Writable;
}

interface CliOptions {
  offset  : number;
  size?   : number;
  length? : number;
  format  : string;
  verbose : number;
}

function formatHelp(): string {
  const width = Math.max(...FORMAT_NAMES.map(n => n.length));
  return '\nFormats:\n' + FORMAT_NAMES
    .map(n => `  ${n.padEnd(width)}  ${EncoderRegistry.resolve(n).description}`)
    .join('\n') + '\n';
}

export function createProgram(io: CliIO = { stdout, stderr }): Command {
  const program = new Command();

  program
    .name('byteslice')
    .version(PKG_VERSION)
    .description('outputs contents of binary files')
    .usage('[options] FILE')
    .argument('[file...]', 'input file (exactly one)')
    .configureOutput({
      // usage and help never mix with encoded output
      writeOut: s => { io.stderr.write(s); },
      writeErr: s => { io.stderr.write(s); },
    })
    .addHelpText('after', formatHelp())
    .exitOverride()

    .addOption(
      new Option('-o, --offset <bytes>', 'offset of output in bytes')
        .argParser(parseOffset)
        .default(0, '0')
    )
    .addOption(
      new Option('-s, --size <bytes>', 'size of output in bytes, -1 reads to the end')
        .argParser(parseSize)
    )
    // alias of --size
    .addOption(
      new Option('-l, --length <bytes>')
        .argParser(parseSize)
        .hideHelp()
    )
    .addOption(
      new Option('-f, --format <name>', 'output format, available: ' + FORMAT_NAMES.join(', '))
        .default(DEFAULT_FORMAT)
    )
    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity on stderr (use multiple times)')
        .default(0)
        .argParser((_: string, previous: number) => previous + 1)
    )

    .action(async (files: string[]) => {
      const opts   = program.opts<CliOptions>();
      const length = opts.size ?? opts.length ?? UNBOUNDED;

      // fail on a bad format before touching the file system
      const encoder = EncoderRegistry.resolve(opts.format);

      if (files.length !== 1) {
        throw new ArgumentError(`expected exactly one argument, got ${files.length}`);
      }

      const slicer = createSlicer({
        verbose: toVerbosity(opts.verbose),
        logger : msg => { io.stderr.write(msg + '\n'); },
      });

      const source = await FileByteSource.open(files[0]);
      try {
        await slicer.extract(source, { offset: opts.offset, length }, encoder.name, toWebWritable(io.stdout));
      } finally {
        await source.close();
      }
    });

  return program;
}
