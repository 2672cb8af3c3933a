/**
 * @module db/mssql-session
 * `DatabaseSession` over the `mssql` driver.
 *
 * Batches run as streaming requests (`request.stream = true`) so rows reach
 * the renderer while the server is still sending them. Server messages
 * (`info` events and request errors) go through the registered message
 * handler; errors the handler fails are raised as `EngineError`s so the
 * execution loop knows they were already shown.
 *
 * The `mssql` batch path does not surface the TDS return-status token, so
 * result sets from this session never carry a `ReturnStatus`.
 */

import * as sql from 'mssql';
import {
  CellValue,
  DatabaseSession,
  ResultSetStream,
  ServerMessage,
  ServerMessageHandler,
} from './session';
import { ConnectionManager } from './connection';
import { DatabaseConfig } from './types';
import { EventResultStream } from './result-stream';
import { ClassifyValue } from './values';
import { EngineError, ShellError, SubmissionError, TransactionError, ToError } from '../core/errors';

/**
 * Reads a numeric field from a driver object whose typings vary between
 * driver versions (`class` is a string in some, a number in others).
 */
function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key);
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
    return Number(value);
  }
  return undefined;
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Extracts a server message from an `info` payload or a `RequestError`.
 * Returns null for errors that did not come from the server.
 */
export function ToServerMessage(source: unknown): ServerMessage | null {
  if (typeof source !== 'object' || source === null) {
    return null;
  }
  const number = readNumber(source, 'number');
  if (number === undefined) {
    return null;
  }
  return {
    Severity: readNumber(source, 'class') ?? 0,
    Number: number,
    State: readNumber(source, 'state') ?? 0,
    Text: readString(source, 'message') ?? '',
    ServerName: readString(source, 'serverName'),
    ProcName: readString(source, 'procName'),
    LineNumber: readNumber(source, 'lineNumber'),
  };
}

function SameServerMessage(a: ServerMessage, b: ServerMessage): boolean {
  return a.Number === b.Number && a.State === b.State && a.Text === b.Text;
}

/**
 * Column names from a `recordset` event payload: an array of column
 * metadata in array-row mode, an object keyed by name otherwise.
 */
export function ColumnNames(columns: unknown): string[] {
  const entries: unknown[] = Array.isArray(columns)
    ? columns
    : typeof columns === 'object' && columns !== null
      ? Object.values(columns)
      : [];

  return entries
    .map((entry, position) => {
      if (typeof entry !== 'object' || entry === null) {
        return { index: position, name: '' };
      }
      return {
        index: readNumber(entry, 'index') ?? position,
        name: readString(entry, 'name') ?? '',
      };
    })
    .sort((a, b) => a.index - b.index)
    .map((column) => column.name);
}

/**
 * Row values in column order.
 */
export function RowValues(row: unknown, columns: readonly string[]): CellValue[] {
  if (Array.isArray(row)) {
    return row.map(ClassifyValue);
  }
  if (typeof row === 'object' && row !== null) {
    return columns.map((name) => ClassifyValue(Reflect.get(row, name)));
  }
  return [ClassifyValue(row)];
}

/**
 * A shell session on one SQL Server connection.
 */
export class MssqlSession implements DatabaseSession {
  private readonly connection: ConnectionManager;
  private transaction: sql.Transaction | null = null;
  private handler: ServerMessageHandler = () => false;

  constructor(connection: ConnectionManager) {
    this.connection = connection;
  }

  /**
   * Connects and returns a ready session.
   * @throws ConnectionError if the connection cannot be established
   */
  static async Open(config: DatabaseConfig): Promise<MssqlSession> {
    const connection = new ConnectionManager(config);
    await connection.Connect();
    return new MssqlSession(connection);
  }

  OnMessage(handler: ServerMessageHandler): void {
    this.handler = handler;
  }

  /**
   * Creates a request bound to the open transaction, or to the pool.
   */
  private createRequest(): sql.Request {
    if (this.transaction) {
      return new sql.Request(this.transaction);
    }
    return new sql.Request(this.connection.GetPool());
  }

  /**
   * Routes a driver error through the message handler.
   * Server errors come back as `EngineError`, anything else as `fallback`.
   */
  private classifyError(err: unknown, fallback: (error: Error) => ShellError): ShellError {
    if (err instanceof ShellError) {
      return err;
    }
    const message = ToServerMessage(err);
    if (message) {
      const failed = this.handler(message);
      if (failed) {
        return new EngineError(message.Severity, message.Number, message.State, message.Text, ToError(err));
      }
    }
    return fallback(ToError(err));
  }

  async Submit(text: string, signal: AbortSignal): Promise<ResultSetStream> {
    if (signal.aborted) {
      throw new SubmissionError('Batch canceled before it was sent');
    }

    const request = this.createRequest();
    request.stream = true;
    request.arrayRowMode = true;

    const stream = new EventResultStream({
      Pause: () => {
        request.pause();
      },
      Resume: () => {
        request.resume();
      },
    });

    let columns: string[] = [];
    const seenErrors = new WeakSet<object>();
    let lastServerError: ServerMessage | null = null;

    const onAbort = () => {
      request.cancel();
    };
    signal.addEventListener('abort', onAbort, { once: true });
    const finish = () => {
      signal.removeEventListener('abort', onAbort);
      stream.Push({ Kind: 'end' });
    };

    const pushError = (err: unknown) => {
      if (typeof err === 'object' && err !== null) {
        if (seenErrors.has(err)) {
          return;
        }
        seenErrors.add(err);
      }
      // The driver reports the last server error again when the batch completes
      const message = ToServerMessage(err);
      if (message && lastServerError && SameServerMessage(message, lastServerError)) {
        return;
      }
      if (message) {
        lastServerError = message;
      }
      const error = this.classifyError(err, (cause) =>
        signal.aborted
          ? new SubmissionError('Batch canceled', cause)
          : new SubmissionError(cause.message, cause)
      );
      stream.Push({ Kind: 'error', Error: error });
    };

    request.on('recordset', (metadata: unknown) => {
      columns = ColumnNames(metadata);
      stream.Push({ Kind: 'columns', Columns: columns });
    });
    request.on('row', (row: unknown) => {
      stream.Push({ Kind: 'row', Values: RowValues(row, columns) });
    });
    request.on('rowsaffected', (count: unknown) => {
      if (typeof count === 'number') {
        stream.Push({ Kind: 'count', Count: count });
      }
    });
    request.on('info', (info: unknown) => {
      const message = ToServerMessage(info);
      if (message && this.handler(message)) {
        pushError(new EngineError(message.Severity, message.Number, message.State, message.Text));
      }
    });
    request.on('error', pushError);

    void request.batch(text).then(finish, (err: unknown) => {
      pushError(err);
      finish();
    });

    await stream.Ready();
    return stream;
  }

  async Begin(): Promise<void> {
    if (this.transaction) {
      throw new TransactionError('A transaction is already open. Commit or roll it back first.');
    }
    const transaction = new sql.Transaction(this.connection.GetPool());
    try {
      await transaction.begin();
    } catch (err) {
      throw this.classifyError(err, (cause) => new TransactionError(`Failed to begin transaction: ${cause.message}`, cause));
    }
    this.transaction = transaction;
  }

  async Commit(): Promise<void> {
    const transaction = this.transaction;
    if (!transaction) {
      throw new TransactionError('No open transaction to commit');
    }
    this.transaction = null;
    try {
      await transaction.commit();
    } catch (err) {
      throw this.classifyError(err, (cause) => new TransactionError(`Failed to commit transaction: ${cause.message}`, cause));
    }
  }

  async Rollback(): Promise<void> {
    const transaction = this.transaction;
    if (!transaction) {
      throw new TransactionError('No open transaction to roll back');
    }
    this.transaction = null;
    try {
      await transaction.rollback();
    } catch (err) {
      throw this.classifyError(err, (cause) => new TransactionError(`Failed to roll back transaction: ${cause.message}`, cause));
    }
  }

  async SelectValue(query: string): Promise<CellValue> {
    const request = this.createRequest();
    request.arrayRowMode = true;
    try {
      const result = await request.query(query);
      const rows: unknown = result.recordset;
      if (!Array.isArray(rows) || rows.length === 0) {
        return ClassifyValue(null);
      }
      const first: unknown = rows[0];
      if (Array.isArray(first)) {
        return ClassifyValue(first[0]);
      }
      return typeof first === 'object' && first !== null
        ? ClassifyValue(Object.values(first)[0])
        : ClassifyValue(first);
    } catch (err) {
      throw this.classifyError(err, (cause) => new SubmissionError(cause.message, cause));
    }
  }

  async ActiveDatabase(): Promise<string> {
    const value = await this.SelectValue('select db_name()');
    return value.Kind === 'scalar' ? String(value.Value) : '';
  }

  async Close(): Promise<void> {
    const transaction = this.transaction;
    this.transaction = null;
    try {
      if (transaction) {
        // An open transaction is never committed implicitly
        await transaction.rollback();
      }
    } finally {
      await this.connection.Disconnect();
    }
  }
}
