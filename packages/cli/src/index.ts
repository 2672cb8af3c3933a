/**
 * @module @sqlbatch/cli
 *
 * CLI package for the sqlbatch shell.
 * This module exports the config loader and the shell command
 * for programmatic use of the CLI functionality.
 *
 * @packageDocumentation
 */

export { LoadConfig, ParseServerAddress, ParseTheme } from './config-loader';
export type { CLIOptions } from './config-loader';
export { RunShell } from './commands/shell';
export { BuildProgram, ToCLIOptions } from './program';
export type { ProgramOptions } from './program';
