#!/usr/bin/env node
import { createProgram } from './cli/program.js';
import { describeError } from './cli/shared.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`error: ${describeError(error)}`);
    process.exit(1);
  });
