#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { CommanderError } from 'commander';
import { stdin, stdout, stderr } from 'node:process';
import { createProgram, formatError } from './program.js';

const program = createProgram({ stdin, stdout, stderr, cwd: process.cwd() });
program.exitOverride();

program.parseAsync(process.argv).catch((err: unknown) => {
  // commander has already printed its own usage / help output
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
    return;
  }
  stderr.write(formatError(err));
  process.exitCode = 1;
});
