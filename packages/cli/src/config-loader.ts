/**
 * @module config-loader
 * Loads shell configuration from files and environment variables.
 *
 * Configuration is loaded in order of precedence (highest first):
 * 1. CLI flags (passed directly)
 * 2. Environment variables, then a .env file (via dotenv)
 * 3. Config file (sqlbatch.json or sqlbatch.config.json)
 * 4. Built-in defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { ShellConfig, DisplayTheme, DISPLAY_THEMES, ConfigurationError, ToError } from '@sqlbatch/core';

/**
 * Configuration file names searched in order.
 */
const CONFIG_FILE_NAMES = ['sqlbatch.json', 'sqlbatch.config.json'];

/**
 * CLI options that can override config file settings.
 */
export interface CLIOptions {
  /** Database server hostname */
  Server?: string;

  /** Database server port */
  Port?: number;

  /** Database name */
  Database?: string;

  /** Database user */
  User?: string;

  /** Database password */
  Password?: string;

  /** Batch terminator regular expression */
  Terminator?: string;

  /** Script file to execute instead of reading the terminal */
  InputFile?: string;

  /** File to write results to */
  OutputFile?: string;

  /** Echo script lines before executing them */
  EchoInput?: boolean;

  /** Echo script lines without the line number prompt */
  NoPromptInEcho?: boolean;

  /** Suppress column headers */
  NoHeader?: boolean;

  /** Table theme name */
  Theme?: string;

  /** Rows per table page */
  PageSize?: number;

  /** Text between columns */
  ColumnSeparator?: string;

  /** Client host name reported to the server */
  ClientHostname?: string;

  /** Login timeout in seconds */
  LoginTimeout?: number;

  /** Command timeout in seconds. 0 waits forever */
  CommandTimeout?: number;

  /** Network packet size in bytes */
  PacketSize?: number;

  /** Encrypt the connection */
  Encrypt?: boolean;

  /** Session language */
  Language?: string;

  /** Path to config file */
  Config?: string;
}

/**
 * Splits a `host:port` server string. A suffix that is not a port number
 * (an instance name like `host\\SQLEXPRESS`, an IPv6 address) is left alone.
 */
export function ParseServerAddress(value: string): { Server: string; Port?: number } {
  const idx = value.lastIndexOf(':');
  if (idx > 0 && value.indexOf(':') === idx) {
    const port = value.substring(idx + 1);
    if (/^\d+$/.test(port)) {
      return { Server: value.substring(0, idx), Port: parseInt(port, 10) };
    }
  }
  return { Server: value };
}

/**
 * Narrows a theme name to a known theme.
 * @throws ConfigurationError for unknown names
 */
export function ParseTheme(value: string): DisplayTheme {
  const theme = DISPLAY_THEMES.find((t) => t === value);
  if (!theme) {
    throw new ConfigurationError(`Unknown theme "${value}". Expected one of: ${DISPLAY_THEMES.join(', ')}`);
  }
  return theme;
}

/**
 * Loads and merges configuration from all sources.
 *
 * @param cliOptions - Options passed via CLI flags
 * @param cwd - Working directory for config file discovery
 * @param processEnv - Environment to read. Defaults to `process.env`
 * @throws ConfigurationError if required configuration is missing
 */
export function LoadConfig(
  cliOptions: CLIOptions,
  cwd: string = process.cwd(),
  processEnv: NodeJS.ProcessEnv = process.env
): ShellConfig {
  // Variables already set win over the .env file
  const env: NodeJS.ProcessEnv = { ...loadDotEnv(cwd), ...processEnv };

  const file = loadConfigFile(cliOptions.Config, cwd);
  const fileDatabase = section(file, 'Database');
  const fileOptions = section(fileDatabase, 'Options');
  const fileInput = section(file, 'Input');
  const fileDisplay = section(file, 'Display');

  // Merge: CLI > env > file > defaults
  const envServer = env.SQLBATCH_SERVER ?? env.DB_HOST;
  const serverAddress = cliOptions.Server ?? envServer ?? readString(fileDatabase, 'Server');
  if (!serverAddress) {
    throw new ConfigurationError('Server is required. Set via -S, SQLBATCH_SERVER env var, or config file.');
  }
  const { Server: server, Port: addressPort } = ParseServerAddress(serverAddress);

  const port = cliOptions.Port
    ?? addressPort
    ?? parsePort(env.SQLBATCH_PORT ?? env.DB_PORT)
    ?? readNumber(fileDatabase, 'Port')
    ?? 1433;

  const database = cliOptions.Database
    ?? env.SQLBATCH_DATABASE ?? env.DB_DATABASE
    ?? readString(fileDatabase, 'Database')
    ?? 'master';

  const user = cliOptions.User
    ?? env.SQLBATCH_USER ?? env.DB_USER
    ?? readString(fileDatabase, 'User');
  if (!user) {
    throw new ConfigurationError('User is required. Set via -U, SQLBATCH_USER env var, or config file.');
  }

  const password = cliOptions.Password
    ?? env.SQLBATCH_PASSWORD ?? env.DB_PASSWORD
    ?? readString(fileDatabase, 'Password')
    ?? '';

  const themeName = cliOptions.Theme ?? env.SQLBATCH_THEME ?? readString(fileDisplay, 'Theme');
  // A login timeout of 0 means the driver default, not "wait forever"
  const loginTimeout = cliOptions.LoginTimeout ? cliOptions.LoginTimeout * 1000 : undefined;
  const commandTimeout = cliOptions.CommandTimeout !== undefined ? cliOptions.CommandTimeout * 1000 : undefined;

  return {
    Database: {
      Server: server,
      Port: port,
      Database: database,
      User: user,
      Password: password,
      Options: {
        Encrypt: cliOptions.Encrypt ?? readBoolean(fileOptions, 'Encrypt') ?? false,
        TrustServerCertificate: readBoolean(fileOptions, 'TrustServerCertificate') ?? true,
        ClientHostname: cliOptions.ClientHostname ?? readString(fileOptions, 'ClientHostname'),
        PacketSize: cliOptions.PacketSize ?? readNumber(fileOptions, 'PacketSize'),
        Language: cliOptions.Language ?? readString(fileOptions, 'Language'),
        RequestTimeout: commandTimeout ?? readNumber(fileOptions, 'RequestTimeout') ?? 0,
        ConnectionTimeout: loginTimeout ?? readNumber(fileOptions, 'ConnectionTimeout') ?? 30_000,
      },
    },
    Input: {
      Terminator: cliOptions.Terminator ?? env.SQLBATCH_TERMINATOR ?? readString(fileInput, 'Terminator'),
      File: cliOptions.InputFile ?? readString(fileInput, 'File'),
      EchoInput: cliOptions.EchoInput ?? readBoolean(fileInput, 'EchoInput'),
      NoPromptInEcho: cliOptions.NoPromptInEcho ?? readBoolean(fileInput, 'NoPromptInEcho'),
      HistoryFile: readString(fileInput, 'HistoryFile'),
    },
    Display: {
      PageSize: cliOptions.PageSize ?? readNumber(fileDisplay, 'PageSize'),
      ColumnSeparator: cliOptions.ColumnSeparator ?? readString(fileDisplay, 'ColumnSeparator'),
      NoHeader: cliOptions.NoHeader ?? readBoolean(fileDisplay, 'NoHeader'),
      Theme: themeName !== undefined ? ParseTheme(themeName) : undefined,
      OutputFile: cliOptions.OutputFile ?? readString(fileDisplay, 'OutputFile'),
    },
  };
}

type ConfigObject = Record<string, unknown>;

function isObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(obj: ConfigObject | null, key: string): ConfigObject | null {
  const value = obj?.[key];
  return isObject(value) ? value : null;
}

function readString(obj: ConfigObject | null, key: string): string | undefined {
  const value = obj?.[key];
  return typeof value === 'string' ? value : undefined;
}

function readNumber(obj: ConfigObject | null, key: string): number | undefined {
  const value = obj?.[key];
  return typeof value === 'number' ? value : undefined;
}

function readBoolean(obj: ConfigObject | null, key: string): boolean | undefined {
  const value = obj?.[key];
  return typeof value === 'boolean' ? value : undefined;
}

function parsePort(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  return parseInt(value, 10);
}

/**
 * Reads `.env` from `cwd`. A missing file is an empty environment.
 */
function loadDotEnv(cwd: string): Record<string, string> {
  const envPath = path.join(cwd, '.env');
  if (!fs.existsSync(envPath)) {
    return {};
  }
  return dotenv.parse(fs.readFileSync(envPath));
}

/**
 * Searches for and loads a config file.
 */
function loadConfigFile(explicitPath: string | undefined, cwd: string): ConfigObject | null {
  if (explicitPath) {
    const fullPath = path.resolve(cwd, explicitPath);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
    throw new ConfigurationError(`Config file not found: ${fullPath}`);
  }

  for (const name of CONFIG_FILE_NAMES) {
    const fullPath = path.join(cwd, name);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
  }

  return null;
}

/**
 * Loads a single JSON config file.
 */
function loadFile(filePath: string): ConfigObject {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${ToError(err).message}`, ToError(err));
  }
  const normalized = normalizeConfigKeys(raw);
  if (!isObject(normalized)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`);
  }
  return normalized;
}

/**
 * Known config key mappings from camelCase to PascalCase.
 * Supports both casings in JSON config files.
 */
const KEY_MAP: Record<string, string> = {
  database: 'Database',
  server: 'Server',
  port: 'Port',
  user: 'User',
  password: 'Password',
  options: 'Options',
  encrypt: 'Encrypt',
  trustServerCertificate: 'TrustServerCertificate',
  clientHostname: 'ClientHostname',
  packetSize: 'PacketSize',
  language: 'Language',
  requestTimeout: 'RequestTimeout',
  connectionTimeout: 'ConnectionTimeout',
  input: 'Input',
  terminator: 'Terminator',
  file: 'File',
  echoInput: 'EchoInput',
  noPromptInEcho: 'NoPromptInEcho',
  historyFile: 'HistoryFile',
  display: 'Display',
  pageSize: 'PageSize',
  columnSeparator: 'ColumnSeparator',
  noHeader: 'NoHeader',
  theme: 'Theme',
  outputFile: 'OutputFile',
};

/**
 * Recursively normalizes config object keys from camelCase to PascalCase.
 * Keys already in PascalCase are left unchanged.
 */
function normalizeConfigKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(normalizeConfigKeys);
  }
  if (!isObject(value)) {
    return value;
  }
  const normalized: ConfigObject = {};
  for (const [key, child] of Object.entries(value)) {
    normalized[KEY_MAP[key] ?? key] = normalizeConfigKeys(child);
  }
  return normalized;
}
