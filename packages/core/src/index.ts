/**
 * @module @sqlbatch/core
 *
 * sqlbatch: an interactive and scripted SQL Server shell that reads
 * terminator-delimited batches, submits them, and renders every result set
 * as paged tables.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Shell } from '@sqlbatch/core';
 *
 * const shell = new Shell({
 *   Database: {
 *     Server: 'localhost',
 *     Database: 'master',
 *     User: 'sa',
 *     Password: 'test-secret',
 *   },
 *   Input: { File: './report.sql', Terminator: ';|^go' },
 *   Display: { PageSize: 500, Theme: 'ASCIICompact' },
 * });
 *
 * const result = await shell.Run();
 * console.log(`Executed ${result.BatchesExecuted} batches`);
 * ```
 *
 * @packageDocumentation
 */

// ─── Main API ────────────────────────────────────────────────────────
export { Shell } from './core/shell';
export type { ShellDependencies, ShellResult } from './core/shell';

// ─── Configuration ───────────────────────────────────────────────────
export { resolveConfig, DISPLAY_THEMES, DEFAULT_TERMINATOR, DEFAULT_PAGE_SIZE } from './core/config';
export type { ShellConfig, InputConfig, DisplayConfig, DisplayTheme, ResolvedShellConfig } from './core/config';

// ─── Database ────────────────────────────────────────────────────────
export type { DatabaseConfig, DatabaseConnectionOptions } from './db/types';
export { ConnectionManager, BuildMssqlConfig } from './db/connection';
export type {
  CellValue,
  ResultSet,
  ResultSetStream,
  ServerMessage,
  ServerMessageHandler,
  DatabaseSession,
} from './db/session';
export { MssqlSession } from './db/mssql-session';
export { EventResultStream } from './db/result-stream';
export type { StreamEvent, FlowControl } from './db/result-stream';
export { HandleServerMessage, FormatServerError, INFORMATIONAL_SEVERITY } from './db/server-messages';
export { ClassifyValue } from './db/values';

// ─── Batches ─────────────────────────────────────────────────────────
export { CompileTerminator, MatchTerminator } from './batch/terminator';
export type { TerminatorMatch } from './batch/terminator';
export { BatchAccumulator } from './batch/accumulator';
export type { FeedResult } from './batch/accumulator';
export { IsInterruptible } from './batch/source';
export type { BatchSource, InterruptibleSource, InterruptNotifier } from './batch/source';
export { ScriptedSource } from './batch/scripted-source';
export type { ScriptedSourceOptions } from './batch/scripted-source';
export { InteractiveSource, FormatPrompt } from './batch/interactive-source';
export type { LineEditor, LineEvent, InteractiveSourceOptions } from './batch/interactive-source';
export { ReadlineEditor, DefaultHistoryPath } from './batch/readline-editor';
export type { ReadlineEditorOptions } from './batch/readline-editor';

// ─── Executor ────────────────────────────────────────────────────────
export { ExecutionLoop } from './executor/execution-loop';
export type { ExecutionLoopOptions, LoopResult, ShellCallbacks } from './executor/execution-loop';
export { CancellationBridge, ProcessSignalNotifier, MergeNotifiers } from './executor/cancellation';
export type { BridgeState } from './executor/cancellation';
export { ControlCommandDispatcher, CONTROL_COMMANDS, IsControlCommand } from './executor/control-commands';
export type { ControlCommand } from './executor/control-commands';
export { RenderResultSet, FormatCell, FormatSummary, FormatTimestamp } from './executor/result-renderer';
export type { RenderOptions, RenderStats } from './executor/result-renderer';
export { OutputSink } from './executor/output';
export { CliTableRenderer, ThemeChars } from './executor/table';
export type { TableRenderer, TableStyle } from './executor/table';

// ─── Errors ──────────────────────────────────────────────────────────
export {
  ShellError,
  ConfigurationError,
  ConnectionError,
  SourceReadError,
  EndOfInputError,
  EngineError,
  SubmissionError,
  ResultSetAdvanceError,
  TransactionError,
  ToError,
} from './core/errors';
