/**
 * @module core/shell
 * Main orchestrator for a shell session.
 *
 * The `Shell` class is the primary public API for programmatic usage. It
 * connects, picks the batch source (a script file or the terminal), wires
 * the server message handler and the output sink, and runs the execution
 * loop until the input ends.
 *
 * @example
 * ```typescript
 * import { Shell } from '@sqlbatch/core';
 *
 * const shell = new Shell({
 *   Database: { Server: 'localhost', Database: 'master', User: 'sa', Password: 'test-secret' },
 *   Input: { File: './seed.sql' },
 * });
 *
 * const result = await shell
 *   .OnProgress({ OnError: (msg) => console.error(msg) })
 *   .Run();
 * process.exitCode = result.Success ? 0 : 1;
 * ```
 */

import { Readable, Writable } from 'stream';
import { ShellConfig, ResolvedShellConfig, resolveConfig } from './config';
import { ToError } from './errors';
import { DatabaseConfig } from '../db/types';
import { DatabaseSession } from '../db/session';
import { MssqlSession } from '../db/mssql-session';
import { HandleServerMessage } from '../db/server-messages';
import { CompileTerminator } from '../batch/terminator';
import { BatchSource, InterruptNotifier, IsInterruptible } from '../batch/source';
import { ScriptedSource } from '../batch/scripted-source';
import { InteractiveSource, LineEditor } from '../batch/interactive-source';
import { ReadlineEditor } from '../batch/readline-editor';
import { MergeNotifiers, ProcessSignalNotifier } from '../executor/cancellation';
import { ExecutionLoop, LoopResult, ShellCallbacks } from '../executor/execution-loop';
import { OutputSink } from '../executor/output';
import { CliTableRenderer } from '../executor/table';

/**
 * Replaceable collaborators. Everything defaults to the real thing: an
 * `mssql` session, stdin/stdout, process signals.
 */
export interface ShellDependencies {
  OpenSession?: (config: DatabaseConfig) => Promise<DatabaseSession>;

  /** Script stream. Takes precedence over `Input.File` and forces scripted mode */
  Script?: Readable;

  /** Line editor for interactive mode */
  Editor?: LineEditor;

  /** Destination when no output file is configured */
  Output?: Writable;

  /** Interrupt source for cancelling batches. Defaults to SIGINT/SIGTERM */
  Interrupts?: InterruptNotifier;
}

/**
 * Result of a `Run()`.
 */
export type ShellResult = LoopResult;

/**
 * An interactive or scripted SQL Server shell.
 */
export class Shell {
  private readonly config: ResolvedShellConfig;
  private readonly terminator: RegExp;
  private readonly deps: ShellDependencies;
  private callbacks: ShellCallbacks = {};

  /**
   * @throws ConfigurationError if the configuration or terminator is invalid
   */
  constructor(config: ShellConfig, deps: ShellDependencies = {}) {
    this.config = resolveConfig(config);
    this.terminator = CompileTerminator(this.config.Input.Terminator);
    this.deps = deps;
  }

  /** True when batches are read from the terminal */
  get Interactive(): boolean {
    return this.deps.Script === undefined && this.config.Input.File === undefined;
  }

  get Config(): ResolvedShellConfig {
    return this.config;
  }

  /**
   * Registers callbacks for observing the session.
   * Returns `this` for chaining.
   */
  OnProgress(callbacks: ShellCallbacks): this {
    this.callbacks = callbacks;
    return this;
  }

  /**
   * Connects and processes batches until the input ends.
   *
   * Never throws: connection and setup failures are reported through
   * `OnError` and come back as an unsuccessful result.
   */
  async Run(): Promise<ShellResult> {
    let session: DatabaseSession | null = null;
    let sink: OutputSink | null = null;
    let source: BatchSource | null = null;

    try {
      const openSession = this.deps.OpenSession ?? ((config: DatabaseConfig) => MssqlSession.Open(config));
      session = await openSession(this.config.Database);

      sink = this.config.Display.OutputFile
        ? await OutputSink.ToFile(this.config.Display.OutputFile)
        : new OutputSink(this.deps.Output ?? process.stdout);
      const out = sink;
      session.OnMessage((message) => HandleServerMessage(message, (text) => out.Write(text)));

      source = await this.openSource(session, out);
      if (this.Interactive) {
        this.callbacks.OnLog?.(`Connected to ${this.config.Database.Server}, database ${this.config.Database.Database}`);
      }

      const interrupts = [this.deps.Interrupts ?? new ProcessSignalNotifier()];
      if (IsInterruptible(source)) {
        interrupts.push(source.Interrupts);
      }

      const loop = new ExecutionLoop({
        Session: session,
        Source: source,
        Terminator: this.terminator,
        PageSize: this.config.Display.PageSize,
        Sink: out,
        CreateTable: () =>
          new CliTableRenderer(out, {
            Theme: this.config.Display.Theme,
            ColumnSeparator: this.config.Display.ColumnSeparator,
            NoHeader: this.config.Display.NoHeader,
          }),
        Interrupts: MergeNotifiers(...interrupts),
        Callbacks: this.callbacks,
      });
      return await loop.Run();
    } catch (err) {
      const message = ToError(err).message;
      this.callbacks.OnError?.(message);
      return { BatchesExecuted: 0, Success: false, ErrorMessage: message };
    } finally {
      await this.release('input', source);
      await this.release('output', sink);
      await this.release('session', session);
    }
  }

  private async openSource(session: DatabaseSession, sink: OutputSink): Promise<BatchSource> {
    const scriptOptions = {
      EchoInput: this.config.Input.EchoInput,
      NoPromptInEcho: this.config.Input.NoPromptInEcho,
      OnEcho: (line: string) => sink.WriteLine(line),
    };
    if (this.deps.Script) {
      return new ScriptedSource(this.deps.Script, scriptOptions);
    }
    if (this.config.Input.File) {
      return ScriptedSource.FromFile(this.config.Input.File, scriptOptions);
    }

    const editor = this.deps.Editor ?? new ReadlineEditor({ HistoryFile: this.config.Input.HistoryFile });
    return new InteractiveSource(editor, session, {
      FallbackServer: this.config.Database.Server,
      FallbackDatabase: this.config.Database.Database,
      OnWarning: (message) => this.callbacks.OnWarning?.(message),
    });
  }

  /**
   * Closes one resource, reporting a failure as a warning so the remaining
   * resources are still closed.
   */
  private async release(label: string, resource: { Close(): Promise<void> } | null): Promise<void> {
    if (!resource) {
      return;
    }
    try {
      await resource.Close();
    } catch (err) {
      this.callbacks.OnWarning?.(`Failed to close ${label}: ${ToError(err).message}`);
    }
  }
}
