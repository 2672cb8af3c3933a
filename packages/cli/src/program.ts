/**
 * @module program
 * Command-line definition for `sqlbatch`.
 *
 * Defaults are deliberately left out of the option definitions: an unset
 * flag falls through to the environment, the config file, and only then the
 * built-in default (see `LoadConfig`).
 */

import { Command, InvalidArgumentError } from 'commander';
import { CLIOptions } from './config-loader';

/**
 * Option values as commander hands them over.
 */
export type ProgramOptions = {
  hideHeader?: boolean;
  echo?: boolean;
  plainEcho?: boolean;
  terminator?: string;
  database?: string;
  hostname?: string;
  input?: string;
  output?: string;
  loginTimeout?: number;
  timeout?: number;
  packetSize?: number;
  pageSize?: number;
  separator?: string;
  server?: string;
  user?: string;
  password?: string;
  theme?: string;
  encrypt?: boolean;
  language?: string;
  config?: string;
};

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parseInt(value, 10);
}

function parseSwitch(value: string): boolean {
  switch (value.toLowerCase()) {
    case 'on':
    case 'true':
    case 'yes':
      return true;
    case 'off':
    case 'false':
    case 'no':
      return false;
    default:
      throw new InvalidArgumentError('Expected on or off.');
  }
}

/**
 * Builds the command-line program.
 *
 * @param version - Version printed by `-v`
 * @param action - Called with the parsed options
 */
export function BuildProgram(version: string, action: (options: ProgramOptions) => Promise<void>): Command {
  const program = new Command();

  program
    .name('sqlbatch')
    .description('Interactive and scripted SQL Server shell')
    .version(version, '-v, --version', 'Print the version and exit')
    .option('-S, --server <host[:port]>', 'SQL Server host, optionally with a port')
    .option('-U, --user <user>', 'Login user')
    .option('-P, --password <password>', 'Login password')
    .option('-D, --database <name>', 'Database to use after login (default: master)')
    .option('-i, --input <file>', 'Execute a script file instead of reading the terminal')
    .option('-o, --output <file>', 'Write results to a file (truncated or created)')
    .option('-c, --terminator <regex>', 'Batch terminator, matched at the end of a line (default: ";|^go")')
    .option('-e, --echo', 'Echo script lines before executing them')
    .option('-n, --plain-echo', 'With -e, echo lines without the line number prompt')
    .option('-b, --hide-header', 'Do not print column headers')
    .option('-p, --page-size <rows>', 'Rows per table page (default: 3000)', parseInteger)
    .option('-s, --separator <text>', 'Column separator (default: " ")')
    .option('-T, --theme <theme>', 'Table theme: ASCIICompact or UtfCompact (default: UtfCompact)')
    .option('-H, --hostname <name>', 'Client host name reported to the server')
    .option('-l, --login-timeout <seconds>', 'Login timeout in seconds, 0 for the default', parseInteger)
    .option('-t, --timeout <seconds>', 'Command timeout in seconds, 0 for none', parseInteger)
    .option('-A, --packet-size <bytes>', 'Network packet size', parseInteger)
    .option('-x, --encrypt <on|off>', 'Encrypt the connection', parseSwitch)
    .option('-z, --language <name>', 'Session language')
    .option('--config <path>', 'Path to config file')
    .action(async () => {
      await action(program.opts<ProgramOptions>());
    });

  return program;
}

/**
 * Maps commander option values to `LoadConfig` input.
 */
export function ToCLIOptions(options: ProgramOptions): CLIOptions {
  return {
    // host:port is split by LoadConfig
    Server: options.server,
    Database: options.database,
    User: options.user,
    Password: options.password,
    Terminator: options.terminator,
    InputFile: options.input,
    OutputFile: options.output,
    EchoInput: options.echo,
    NoPromptInEcho: options.plainEcho,
    NoHeader: options.hideHeader,
    Theme: options.theme,
    PageSize: options.pageSize,
    ColumnSeparator: options.separator,
    ClientHostname: options.hostname,
    LoginTimeout: options.loginTimeout,
    CommandTimeout: options.timeout,
    PacketSize: options.packetSize,
    Encrypt: options.encrypt,
    Language: options.language,
    Config: options.config,
  };
}
