/**
 * @module db/session
 * Contracts between the execution loop and the database session.
 *
 * The loop only ever talks to these interfaces. `MssqlSession` implements
 * them over the `mssql` driver; tests implement them in memory.
 */

/**
 * A single cell as produced by the session.
 *
 * The set of kinds is closed so formatting is an exhaustive switch rather
 * than runtime type sniffing.
 */
export type CellValue =
  | { Kind: 'null' }
  | { Kind: 'timestamp'; Value: Date }
  | { Kind: 'binary'; Value: Uint8Array }
  | { Kind: 'scalar'; Value: string | number | bigint | boolean };

/**
 * One result set produced by a batch: ordered column names plus a cursor
 * over the rows.
 */
export interface ResultSet {
  /** Column names in order. Empty for statements that return no rows */
  readonly Columns: readonly string[];

  /**
   * Fetches the next row, or `null` once the result set is exhausted.
   * @throws when the row cannot be fetched
   */
  NextRow(): Promise<CellValue[] | null>;

  /**
   * Rows affected by the statement, once the result set is exhausted.
   * `undefined` when the engine did not report a count.
   */
  readonly RowsAffected: number | undefined;

  /** Procedure return status, `undefined` when not reported */
  readonly ReturnStatus: number | undefined;
}

/**
 * The ordered result sets of one submitted batch.
 */
export interface ResultSetStream {
  /** The result set currently being consumed */
  Current(): ResultSet;

  /**
   * True when the engine has another result set after the current one.
   * Only meaningful once the current result set is exhausted.
   */
  HasNext(): Promise<boolean>;

  /**
   * Moves to the next result set.
   * @throws when the session cannot advance
   */
  Advance(): Promise<void>;
}

/**
 * A diagnostic message sent by the server (PRINT output, warnings, errors).
 */
export interface ServerMessage {
  /** Severity level (class). 10 and below is informational */
  Severity: number;

  /** Message number */
  Number: number;

  /** Message state */
  State: number;

  /** Message text as sent by the server */
  Text: string;

  ServerName?: string;
  ProcName?: string;
  LineNumber?: number;
}

/**
 * Receives every server message. Returns true when the message means the
 * current operation failed.
 */
export type ServerMessageHandler = (message: ServerMessage) => boolean;

/**
 * A connected database session.
 */
export interface DatabaseSession {
  /**
   * Submits a batch. Resolves once the engine has started answering, with
   * the first result set ready to consume.
   *
   * @param text - Batch text, sent as-is
   * @param signal - Aborting it cancels the in-flight batch
   * @throws EngineError when the engine rejected the batch
   * @throws SubmissionError for any other failure
   */
  Submit(text: string, signal: AbortSignal): Promise<ResultSetStream>;

  Begin(): Promise<void>;
  Commit(): Promise<void>;
  Rollback(): Promise<void>;

  /** Registers the handler invoked for every server message */
  OnMessage(handler: ServerMessageHandler): void;

  /** Runs an introspection query and returns the first column of the first row */
  SelectValue(query: string): Promise<CellValue>;

  /** Name of the database the session is currently using */
  ActiveDatabase(): Promise<string>;

  Close(): Promise<void>;
}
