#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { CommanderError } from 'commander';
import { argv, stderr, exit as processExit } from 'node:process';
import { createProgram } from './program.js';

function fail(err: unknown): never {
  if (err instanceof CommanderError) {
    // commander has already printed usage / help / version
    processExit(err.exitCode);
  }
  if (err instanceof Error) {
    stderr.write(`Error [${err.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  processExit(1);
}

process.on('uncaughtException', fail);
process.on('unhandledRejection', fail);

createProgram().parseAsync(argv).catch(fail);
