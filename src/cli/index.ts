#!/usr/bin/env node
import { CommanderError } from 'commander';

import { ExitCode } from '../types/enums';

import { createProgram } from './program';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    if (err instanceof CommanderError) {
      // help and --version exit with 0; parse errors share the generic error code
      process.exitCode = err.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.ERROR;
      return;
    }
    console.error(err);
    process.exitCode = ExitCode.ERROR;
  });
