#!/usr/bin/env node

import { main } from './cli.js';
import { toCliError } from './errors.js';
import { formatCliError } from './formatter.js';
import { createDefaultDependencies } from './services/defaults.js';

function writeErr(message: string): void {
  process.stderr.write(`${message}\n`);
}

void main(process.argv, createDefaultDependencies, writeErr).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    writeErr(formatCliError(toCliError(error), false));
    process.exitCode = 1;
  }
);
