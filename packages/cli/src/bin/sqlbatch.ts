#!/usr/bin/env node
/**
 * @module bin/sqlbatch
 * CLI entry point for sqlbatch.
 *
 * Usage:
 *   sqlbatch -S host[:port] -U user [-P password] [-D database]
 *   sqlbatch -S host -U user -i script.sql [-o results.txt] [-e]
 */

import { ToError } from '@sqlbatch/core';
import { BuildProgram, ToCLIOptions } from '../program';
import { LoadConfig } from '../config-loader';
import { RunShell } from '../commands/shell';
import { LogError } from '../formatting';

const VERSION = '0.1.0';

const program = BuildProgram(VERSION, async (options) => {
  try {
    const config = LoadConfig(ToCLIOptions(options));
    const success = await RunShell(config, VERSION);
    process.exit(success ? 0 : 1);
  } catch (err) {
    LogError(ToError(err).message);
    process.exit(1);
  }
});

program.parseAsync(process.argv).catch((err: unknown) => {
  LogError(ToError(err).message);
  process.exit(1);
});
