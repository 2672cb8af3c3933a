/**
 * @module formatting
 * Console output formatting for the sqlbatch CLI.
 *
 * Query results never pass through here: they go to the output sink. These
 * helpers cover the banner and diagnostics, which go to stderr so that
 * redirected results stay clean.
 */

import chalk from 'chalk';

/**
 * Prints the banner. Only shown in interactive mode.
 */
export function PrintBanner(version: string): void {
  console.log(chalk.cyan.bold('sqlbatch') + chalk.gray(` ${version}, SQL Server batch shell`));
  console.log(chalk.gray('End a batch with ; or go. \\b, \\c and \\r begin, commit and roll back. Ctrl-D exits.\n'));
}

/**
 * Logs an informational message.
 */
export function LogInfo(message: string): void {
  console.log(chalk.gray(message));
}

/**
 * Logs a non-fatal problem.
 */
export function LogWarning(message: string): void {
  console.error(chalk.yellow('WARNING: ' + message));
}

/**
 * Logs an error message.
 */
export function LogError(message: string): void {
  console.error(chalk.red('ERROR: ' + message));
}
