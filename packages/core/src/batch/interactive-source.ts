/**
 * @module batch/interactive-source
 * Reads batches typed at the terminal.
 */

import { InterruptibleSource, InterruptNotifier } from './source';
import { BatchAccumulator } from './accumulator';
import { DatabaseSession } from '../db/session';
import { ShellError, SourceReadError, ToError } from '../core/errors';

/**
 * What the line editor hands back for one prompt.
 */
export type LineEvent = { Kind: 'line'; Text: string } | { Kind: 'interrupt' };

/**
 * The terminal line-editing widget.
 */
export interface LineEditor {
  SetPrompt(prompt: string): void;

  /**
   * Reads one line. Ctrl-C while reading yields an `interrupt` event.
   * @throws EndOfInputError when the terminal is closed (Ctrl-D)
   */
  ReadLine(): Promise<LineEvent>;

  /** Adds a finalized batch to the recallable history */
  SaveHistory(entry: string): void;

  /** Ctrl-C pressed while no line is being read */
  readonly Interrupts: InterruptNotifier;

  Close(): Promise<void>;
}

export interface InteractiveSourceOptions {
  /** Label shown when the server name cannot be queried */
  FallbackServer: string;

  /** Database name shown when the active database cannot be queried */
  FallbackDatabase: string;

  /** Receives non-fatal problems, such as a failed prompt query */
  OnWarning?: (message: string) => void;
}

/**
 * Builds the prompt: `<server>.<database> <line> $ `.
 */
export function FormatPrompt(server: string, database: string, lineNo: number): string {
  return `${server}.${database} ${lineNo} $ `;
}

/**
 * Batch reader over a line editor.
 *
 * Ctrl-C while typing discards the batch in progress and starts over at
 * line 1 without leaving `ReadBatch`. Closing the terminal propagates as
 * end of input, dropping any partial batch.
 */
export class InteractiveSource implements InterruptibleSource {
  private readonly editor: LineEditor;
  private readonly session: DatabaseSession;
  private readonly options: InteractiveSourceOptions;
  private server: string | null = null;
  private database: string;
  private lineNo = 1;

  constructor(editor: LineEditor, session: DatabaseSession, options: InteractiveSourceOptions) {
    this.editor = editor;
    this.session = session;
    this.options = options;
    this.database = options.FallbackDatabase;
  }

  get Interrupts(): InterruptNotifier {
    return this.editor.Interrupts;
  }

  /** Current 1-based line number within the batch being typed */
  get LineNo(): number {
    return this.lineNo;
  }

  /**
   * Resolves the home server label once per session.
   */
  private async serverLabel(): Promise<string> {
    if (this.server !== null) {
      return this.server;
    }
    try {
      const value = await this.session.SelectValue('select @@servername');
      this.server = value.Kind === 'scalar' && String(value.Value) !== ''
        ? String(value.Value)
        : this.options.FallbackServer;
    } catch (err) {
      this.options.OnWarning?.(`Could not query the server name: ${ToError(err).message}`);
      this.server = this.options.FallbackServer;
    }
    return this.server;
  }

  /**
   * Refreshes the active database name. Only a batch can change it, so this
   * runs once per batch rather than once per line.
   */
  private async refreshDatabase(): Promise<void> {
    try {
      const name = await this.session.ActiveDatabase();
      if (name !== '') {
        this.database = name;
      }
    } catch (err) {
      this.options.OnWarning?.(`Could not query the active database: ${ToError(err).message}`);
    }
  }

  async ReadBatch(terminator: RegExp): Promise<string> {
    let accumulator = new BatchAccumulator(terminator);
    this.lineNo = 1;
    const server = await this.serverLabel();
    await this.refreshDatabase();

    for (;;) {
      this.editor.SetPrompt(FormatPrompt(server, this.database, this.lineNo));

      let event: LineEvent;
      try {
        event = await this.editor.ReadLine();
      } catch (err) {
        throw err instanceof ShellError
          ? err
          : new SourceReadError(`Failed to read input: ${ToError(err).message}`, ToError(err));
      }

      if (event.Kind === 'interrupt') {
        accumulator = new BatchAccumulator(terminator);
        this.lineNo = 1;
        continue;
      }

      const result = accumulator.Feed(event.Text);
      if (result.Done) {
        this.lineNo = 1;
        this.editor.SaveHistory(result.Batch);
        return result.Batch;
      }
      this.lineNo++;
    }
  }

  async Close(): Promise<void> {
    await this.editor.Close();
  }
}
