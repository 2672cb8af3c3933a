/**
 * @module executor/execution-loop
 * The read-submit-render loop.
 *
 * Batches are strictly serialized: the next batch is not read until every
 * result set of the previous one has been rendered and flushed.
 */

import { BatchSource, InterruptNotifier } from '../batch/source';
import { DatabaseSession, ResultSetStream } from '../db/session';
import { EndOfInputError, EngineError, ResultSetAdvanceError, ToError } from '../core/errors';
import { CancellationBridge } from './cancellation';
import { ControlCommandDispatcher } from './control-commands';
import { OutputSink } from './output';
import { RenderResultSet } from './result-renderer';
import { TableRenderer } from './table';

/**
 * Callbacks for observing the shell. Query results never go through these;
 * they are written to the output sink.
 */
export interface ShellCallbacks {
  /** Informational messages (connection established, ...) */
  OnLog?: (message: string) => void;

  /** Errors that were not already printed by the server message handler */
  OnError?: (message: string) => void;

  /** Non-fatal problems */
  OnWarning?: (message: string) => void;
}

export interface ExecutionLoopOptions {
  Session: DatabaseSession;
  Source: BatchSource;

  /** Compiled terminator from `CompileTerminator` */
  Terminator: RegExp;

  PageSize: number;
  Sink: OutputSink;
  CreateTable: () => TableRenderer;

  /** Interrupts that cancel the batch in flight */
  Interrupts: InterruptNotifier;

  Callbacks?: ShellCallbacks;
}

/**
 * Outcome of `ExecutionLoop.Run()`.
 */
export interface LoopResult {
  /** Batches submitted to the server. Control commands are not counted */
  BatchesExecuted: number;

  /** False when the loop stopped on a read failure or a failed result set advance */
  Success: boolean;

  ErrorMessage?: string;
}

export class ExecutionLoop {
  private readonly options: ExecutionLoopOptions;
  private readonly callbacks: ShellCallbacks;
  private readonly dispatcher: ControlCommandDispatcher;

  constructor(options: ExecutionLoopOptions) {
    this.options = options;
    this.callbacks = options.Callbacks ?? {};
    this.dispatcher = new ControlCommandDispatcher(options.Session, (message) => this.callbacks.OnError?.(message));
  }

  /**
   * Reads and executes batches until the source reports end of input or a
   * fatal error occurs.
   */
  async Run(): Promise<LoopResult> {
    const { Source, Sink, Terminator } = this.options;
    let executed = 0;

    for (;;) {
      let batch: string;
      try {
        batch = await Source.ReadBatch(Terminator);
      } catch (err) {
        await Sink.Flush();
        if (err instanceof EndOfInputError) {
          return { BatchesExecuted: executed, Success: true };
        }
        const message = ToError(err).message;
        this.callbacks.OnError?.(message);
        return { BatchesExecuted: executed, Success: false, ErrorMessage: message };
      }

      // Echoed script lines come out before the batch's results
      await Sink.Flush();

      if (batch.trim() === '') {
        continue;
      }
      if (await this.dispatcher.Dispatch(batch)) {
        await Sink.Flush();
        continue;
      }

      executed++;
      try {
        await this.ExecuteBatch(batch);
      } catch (err) {
        if (!(err instanceof ResultSetAdvanceError)) {
          throw err;
        }
        await Sink.Flush();
        this.callbacks.OnError?.(err.message);
        return { BatchesExecuted: executed, Success: false, ErrorMessage: err.message };
      }
    }
  }

  /**
   * Submits one batch and renders all of its result sets.
   *
   * Submission failures are reported (unless the server message handler
   * already printed them) and swallowed, so the loop moves on to the next
   * batch.
   *
   * @throws ResultSetAdvanceError when the session cannot move to a pending result set
   */
  async ExecuteBatch(batch: string): Promise<void> {
    const { Session, Sink, Interrupts } = this.options;

    let results: ResultSetStream;
    try {
      results = await CancellationBridge.Run(Interrupts, (signal) => Session.Submit(batch, signal));
    } catch (err) {
      await Sink.Flush();
      if (!(err instanceof EngineError)) {
        this.callbacks.OnError?.(ToError(err).message);
      }
      return;
    }

    for (;;) {
      await RenderResultSet(results.Current(), {
        PageSize: this.options.PageSize,
        CreateTable: this.options.CreateTable,
        Sink,
        OnError: (message) => this.callbacks.OnError?.(message),
      });

      const more = await advanceStep(() => results.HasNext());
      if (!more) {
        return;
      }
      Sink.WriteLine();
      await advanceStep(() => results.Advance());
    }
  }
}

/**
 * Runs one step of moving between result sets, reporting any failure as a
 * `ResultSetAdvanceError`.
 */
async function advanceStep<T>(step: () => Promise<T>): Promise<T> {
  try {
    return await step();
  } catch (err) {
    if (err instanceof ResultSetAdvanceError) {
      throw err;
    }
    const cause = ToError(err);
    throw new ResultSetAdvanceError(`Failed to advance to the next result set: ${cause.message}`, cause);
  }
}
