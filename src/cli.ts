#!/usr/bin/env node
import { createProgram } from './cli/program.js';
import { exitWithError } from './cli/shared.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    exitWithError(`cyclewatch: fatal error: ${error instanceof Error ? error.message : String(error)}`);
  });
