/**
 * @module core/config
 * Shell configuration types and defaults.
 */

import { DatabaseConfig } from '../db/types';
import { ConfigurationError } from './errors';

/**
 * Table drawing style.
 *
 * - `'UtfCompact'` — header underlined with box-drawing characters (default)
 * - `'ASCIICompact'` — header underlined with `-`
 */
export type DisplayTheme = 'ASCIICompact' | 'UtfCompact';

export const DISPLAY_THEMES: readonly DisplayTheme[] = ['ASCIICompact', 'UtfCompact'];

/** Matches a trailing semicolon, or a line that starts with `go`. */
export const DEFAULT_TERMINATOR = ';|^go';

export const DEFAULT_PAGE_SIZE = 3000;

/**
 * Complete configuration for a shell session, as supplied by the caller.
 */
export interface ShellConfig {
  /** SQL Server connection settings */
  Database: DatabaseConfig;

  /** How batches are read */
  Input?: InputConfig;

  /** How results are rendered */
  Display?: DisplayConfig;
}

/**
 * Input source and batch delimiting settings.
 */
export interface InputConfig {
  /**
   * Regular expression that ends a batch when it matches at the end of a
   * line. May contain alternation. Defaults to `;|^go`.
   */
  Terminator?: string;

  /**
   * Script file to read batches from. When absent, batches are read
   * interactively from the terminal.
   */
  File?: string;

  /** Print each consumed script line before its batch executes */
  EchoInput?: boolean;

  /** Omit the `<n>> ` line prompt from echoed lines */
  NoPromptInEcho?: boolean;

  /** Interactive history file. Defaults to `$XDG_CONFIG_HOME/sqlbatch/history` */
  HistoryFile?: string;
}

/**
 * Result rendering settings.
 */
export interface DisplayConfig {
  /** Rows per rendered table page. Defaults to 3000 */
  PageSize?: number;

  /** Text placed between columns. Defaults to a single space */
  ColumnSeparator?: string;

  /** Suppress column headers */
  NoHeader?: boolean;

  /** Table drawing style. Defaults to `'UtfCompact'` */
  Theme?: DisplayTheme;

  /** File to write results to (truncated or created). Defaults to stdout */
  OutputFile?: string;
}

/**
 * Fully defaulted, immutable configuration. Built once at startup and handed
 * to the components that need it.
 */
export interface ResolvedShellConfig {
  readonly Database: DatabaseConfig;
  readonly Input: Readonly<Required<Omit<InputConfig, 'File' | 'HistoryFile'>>> &
    Readonly<Pick<InputConfig, 'File' | 'HistoryFile'>>;
  readonly Display: Readonly<Required<Omit<DisplayConfig, 'OutputFile'>>> &
    Readonly<Pick<DisplayConfig, 'OutputFile'>>;
}

/**
 * Merges user-provided config with defaults and validates it.
 * @throws ConfigurationError if the page size or theme is invalid
 */
export function resolveConfig(config: ShellConfig): ResolvedShellConfig {
  const pageSize = config.Display?.PageSize ?? DEFAULT_PAGE_SIZE;
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new ConfigurationError(`Page size must be a positive integer, got ${pageSize}`);
  }

  const theme = config.Display?.Theme ?? 'UtfCompact';
  if (!DISPLAY_THEMES.includes(theme)) {
    throw new ConfigurationError(
      `Unknown display theme "${theme}". Expected one of: ${DISPLAY_THEMES.join(', ')}`
    );
  }

  return Object.freeze({
    Database: Object.freeze({ ...config.Database }),
    Input: Object.freeze({
      Terminator: config.Input?.Terminator ?? DEFAULT_TERMINATOR,
      File: config.Input?.File,
      EchoInput: config.Input?.EchoInput ?? false,
      NoPromptInEcho: config.Input?.NoPromptInEcho ?? false,
      HistoryFile: config.Input?.HistoryFile,
    }),
    Display: Object.freeze({
      PageSize: pageSize,
      ColumnSeparator: config.Display?.ColumnSeparator ?? ' ',
      NoHeader: config.Display?.NoHeader ?? false,
      Theme: theme,
      OutputFile: config.Display?.OutputFile,
    }),
  });
}
