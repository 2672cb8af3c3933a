import { Writable } from 'stream';
import {
  CellValue,
  DatabaseSession,
  ResultSet,
  ResultSetStream,
  ServerMessageHandler,
} from '../db/session';
import { EventResultStream } from '../db/result-stream';
import { InterruptNotifier } from '../batch/source';
import { LineEditor, LineEvent } from '../batch/interactive-source';
import { TableRenderer } from '../executor/table';
import { EndOfInputError, ResultSetAdvanceError } from '../core/errors';

export function Scalar(value: string | number | bigint | boolean): CellValue {
  return { Kind: 'scalar', Value: value };
}

export interface FakeResultSetInit {
  Columns?: string[];
  Rows?: CellValue[][];
  RowsAffected?: number;
  ReturnStatus?: number;

  /** Thrown by NextRow once all rows have been returned */
  RowError?: Error;
}

export class FakeResultSet implements ResultSet {
  readonly Columns: readonly string[];
  readonly RowsAffected: number | undefined;
  readonly ReturnStatus: number | undefined;
  private readonly rows: CellValue[][];
  private readonly rowError: Error | undefined;
  Fetches = 0;

  constructor(init: FakeResultSetInit = {}) {
    this.Columns = init.Columns ?? [];
    this.rows = [...(init.Rows ?? [])];
    this.RowsAffected = init.RowsAffected;
    this.ReturnStatus = init.ReturnStatus;
    this.rowError = init.RowError;
  }

  async NextRow(): Promise<CellValue[] | null> {
    this.Fetches++;
    const row = this.rows.shift();
    if (row) {
      return row;
    }
    if (this.rowError) {
      throw this.rowError;
    }
    return null;
  }
}

export class FakeResultStream implements ResultSetStream {
  private index = 0;

  constructor(
    private readonly sets: FakeResultSet[],
    private readonly advanceError?: Error
  ) {}

  Current(): ResultSet {
    return this.sets[this.index];
  }

  async HasNext(): Promise<boolean> {
    return this.advanceError !== undefined || this.index < this.sets.length - 1;
  }

  async Advance(): Promise<void> {
    if (this.advanceError) {
      throw this.advanceError;
    }
    if (this.index >= this.sets.length - 1) {
      throw new ResultSetAdvanceError('No further result sets are pending');
    }
    this.index++;
  }
}

/**
 * What a fake session answers for one submitted batch.
 */
export type FakeAnswer =
  | FakeResultSet[]
  | { Sets: FakeResultSet[]; AdvanceError: Error }
  | ResultSetStream
  | Error;

export class FakeSession implements DatabaseSession {
  readonly Submitted: string[] = [];
  readonly Signals: AbortSignal[] = [];
  readonly Calls: string[] = [];
  Handler: ServerMessageHandler | null = null;
  ServerName: CellValue | Error = Scalar('db01');
  DatabaseName: string | Error = 'master';
  TransactionFailure: Error | null = null;
  Closed = false;

  /** Runs before Submit answers, with the batch's abort signal */
  OnSubmit: ((text: string, signal: AbortSignal) => Promise<void>) | null = null;

  constructor(private readonly answer: (text: string) => FakeAnswer = () => []) {}

  async Submit(text: string, signal: AbortSignal): Promise<ResultSetStream> {
    this.Submitted.push(text);
    this.Signals.push(signal);
    if (this.OnSubmit) {
      await this.OnSubmit(text, signal);
    }
    const answer = this.answer(text);
    if (answer instanceof Error) {
      throw answer;
    }
    if (Array.isArray(answer)) {
      return new FakeResultStream(answer.length > 0 ? answer : [new FakeResultSet()]);
    }
    if ('Sets' in answer) {
      return new FakeResultStream(answer.Sets, answer.AdvanceError);
    }
    if (answer instanceof EventResultStream) {
      await answer.Ready();
    }
    return answer;
  }

  private async transactionCall(name: string): Promise<void> {
    this.Calls.push(name);
    if (this.TransactionFailure) {
      throw this.TransactionFailure;
    }
  }

  Begin(): Promise<void> {
    return this.transactionCall('begin');
  }

  Commit(): Promise<void> {
    return this.transactionCall('commit');
  }

  Rollback(): Promise<void> {
    return this.transactionCall('rollback');
  }

  OnMessage(handler: ServerMessageHandler): void {
    this.Handler = handler;
  }

  async SelectValue(query: string): Promise<CellValue> {
    this.Calls.push(query);
    if (this.ServerName instanceof Error) {
      throw this.ServerName;
    }
    return this.ServerName;
  }

  async ActiveDatabase(): Promise<string> {
    if (this.DatabaseName instanceof Error) {
      throw this.DatabaseName;
    }
    return this.DatabaseName;
  }

  async Close(): Promise<void> {
    this.Closed = true;
  }
}

export class FakeNotifier implements InterruptNotifier {
  private readonly listeners = new Set<() => void>();
  Subscriptions = 0;

  Subscribe(listener: () => void): () => void {
    this.Subscriptions++;
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get ListenerCount(): number {
    return this.listeners.size;
  }

  Trigger(): void {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}

/**
 * Records every page instead of drawing it.
 */
export class RecordingTable implements TableRenderer {
  Header: string[] = [];
  readonly Pages: string[][][] = [];
  private rows: string[][] = [];

  SetHeader(columns: readonly string[]): void {
    this.Header = [...columns];
  }

  Append(row: readonly string[]): void {
    this.rows.push([...row]);
  }

  Render(): void {
    this.Pages.push(this.rows);
    this.rows = [];
  }
}

/**
 * Line editor that replays a fixed script of events, then reports end of
 * input.
 */
export class FakeEditor implements LineEditor {
  readonly Prompts: string[] = [];
  readonly History: string[] = [];
  readonly Interrupts = new FakeNotifier();
  Closed = false;
  private readonly events: LineEvent[];

  constructor(events: Array<string | LineEvent>) {
    this.events = events.map((e): LineEvent => (typeof e === 'string' ? { Kind: 'line', Text: e } : e));
  }

  SetPrompt(prompt: string): void {
    this.Prompts.push(prompt);
  }

  async ReadLine(): Promise<LineEvent> {
    const event = this.events.shift();
    if (!event) {
      throw new EndOfInputError();
    }
    return event;
  }

  SaveHistory(entry: string): void {
    this.History.push(entry);
  }

  async Close(): Promise<void> {
    this.Closed = true;
  }
}

/**
 * Writable that keeps everything written to it.
 */
export class MemoryWritable extends Writable {
  private readonly chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
    callback();
  }

  get Text(): string {
    return this.chunks.join('');
  }
}
