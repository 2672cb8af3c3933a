/**
 * @module core/errors
 * Error types for the sqlbatch shell.
 */

/**
 * Base error class for all shell errors.
 * Carries a machine-readable code so callers can branch without string matching.
 */
export class ShellError extends Error {
  /** Machine-readable error code for programmatic handling */
  readonly Code: string;

  constructor(code: string, message: string, cause?: Error) {
    super(message);
    this.name = 'ShellError';
    this.Code = code;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Thrown when the resolved configuration is unusable (missing server, bad
 * terminator pattern, non-positive page size, ...).
 */
export class ConfigurationError extends ShellError {
  constructor(message: string, cause?: Error) {
    super('INVALID_CONFIGURATION', message, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when the connection to SQL Server cannot be established.
 */
export class ConnectionError extends ShellError {
  constructor(message: string, cause?: Error) {
    super('CONNECTION_FAILED', message, cause);
    this.name = 'ConnectionError';
  }
}

/**
 * Signals that the batch source has no more input.
 *
 * Not a failure: the execution loop stops cleanly when it sees one. When the
 * input ended in the middle of a batch, the unterminated text travels along
 * in `PartialBatch`.
 */
export class EndOfInputError extends ShellError {
  /** Text accumulated since the last terminator, if any */
  readonly PartialBatch?: string;

  constructor(partialBatch?: string) {
    super('END_OF_INPUT', 'End of input');
    this.name = 'EndOfInputError';
    this.PartialBatch = partialBatch;
  }
}

/**
 * Thrown when the next line cannot be read from the input source.
 */
export class SourceReadError extends ShellError {
  constructor(message: string, cause?: Error) {
    super('SOURCE_READ_FAILED', message, cause);
    this.name = 'SourceReadError';
  }
}

/**
 * A diagnostic raised by the database engine itself.
 *
 * By the time one of these reaches the execution loop, the server message
 * handler has already printed it, so the loop does not print it again.
 */
export class EngineError extends ShellError {
  /** Server severity level (class). Anything above 10 is an error */
  readonly Severity: number;

  /** Server message number */
  readonly Number: number;

  /** Server message state */
  readonly State: number;

  constructor(severity: number, number: number, state: number, message: string, cause?: Error) {
    super('ENGINE_ERROR', message, cause);
    this.name = 'EngineError';
    this.Severity = severity;
    this.Number = number;
    this.State = state;
  }
}

/**
 * Thrown when a batch could not be submitted for a reason the engine did not
 * report (lost connection, cancellation, driver failure).
 */
export class SubmissionError extends ShellError {
  constructor(message: string, cause?: Error) {
    super('SUBMISSION_FAILED', message, cause);
    this.name = 'SubmissionError';
  }
}

/**
 * Thrown when the session cannot move on to the next pending result set.
 * Fatal: no further batches are processed.
 */
export class ResultSetAdvanceError extends ShellError {
  constructor(message: string, cause?: Error) {
    super('RESULT_SET_ADVANCE_FAILED', message, cause);
    this.name = 'ResultSetAdvanceError';
  }
}

/**
 * Thrown when a transaction fails to begin, commit or rollback.
 */
export class TransactionError extends ShellError {
  constructor(message: string, cause?: Error) {
    super('TRANSACTION_FAILED', message, cause);
    this.name = 'TransactionError';
  }
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function ToError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
