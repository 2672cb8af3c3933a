/**
 * @module commands/shell
 * Runs the shell: interactive when no input file is given, scripted otherwise.
 */

import { Shell, ShellConfig, ShellDependencies } from '@sqlbatch/core';
import { PrintBanner, LogInfo, LogWarning, LogError } from '../formatting';

/**
 * Executes the shell until its input ends.
 *
 * @param config - Merged shell configuration
 * @param version - Version shown in the interactive banner
 * @param deps - Collaborator overrides, used by tests
 * @returns true when the input ended without a fatal error
 */
export async function RunShell(config: ShellConfig, version: string, deps: ShellDependencies = {}): Promise<boolean> {
  const shell = new Shell(config, deps);

  shell.OnProgress({
    OnLog: LogInfo,
    OnWarning: LogWarning,
    OnError: LogError,
  });

  if (shell.Interactive) {
    PrintBanner(version);
  }

  const result = await shell.Run();
  return result.Success;
}
