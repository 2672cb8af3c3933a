/**
 * @module db/result-stream
 * Turns a driver's push-style token events into the pull-style
 * `ResultSetStream` the execution loop consumes.
 *
 * The driver pushes events as the server streams tokens back:
 *
 *   columns → row* → count        one SELECT
 *   count                          one INSERT/UPDATE/DELETE
 *   status                         procedure return status
 *   error                          server or driver error
 *   end                            the batch is complete
 *
 * A result set starts at a `columns` event, or at a `count` that arrives
 * once the previous result set has its own count. Events are queued until
 * the loop asks for them; when the queue grows past a high watermark the
 * driver is paused and resumed once the loop has caught up.
 */

import { EngineError, ResultSetAdvanceError } from '../core/errors';
import { CellValue, ResultSet, ResultSetStream } from './session';

export type StreamEvent =
  | { Kind: 'columns'; Columns: string[] }
  | { Kind: 'row'; Values: CellValue[] }
  | { Kind: 'count'; Count: number }
  | { Kind: 'status'; Status: number }
  | { Kind: 'error'; Error: Error }
  | { Kind: 'end' };

/**
 * Flow control hooks into the underlying request.
 */
export interface FlowControl {
  Pause(): void;
  Resume(): void;
}

const HIGH_WATERMARK = 1000;
const LOW_WATERMARK = 100;

/**
 * One result set backed by the shared event queue.
 */
class StreamedResultSet implements ResultSet {
  readonly Columns: readonly string[];
  RowsAffected: number | undefined;
  ReturnStatus: number | undefined;
  private exhausted = false;

  constructor(
    private readonly owner: EventResultStream,
    columns: readonly string[],
    rowsAffected?: number
  ) {
    this.Columns = columns;
    this.RowsAffected = rowsAffected;
  }

  /** True once this set's rows are consumed and its count (if any) is known */
  get Exhausted(): boolean {
    return this.exhausted;
  }

  async NextRow(): Promise<CellValue[] | null> {
    while (!this.exhausted) {
      const event = await this.owner.Peek();
      switch (event.Kind) {
        case 'row':
          this.owner.Take();
          return event.Values;
        case 'count':
          if (this.RowsAffected !== undefined) {
            // Belongs to the next result set
            this.exhausted = true;
            break;
          }
          this.owner.Take();
          this.RowsAffected = event.Count;
          break;
        case 'status':
          this.owner.Take();
          this.ReturnStatus = event.Status;
          break;
        case 'error':
          this.owner.Take();
          this.exhausted = true;
          throw event.Error;
        case 'columns':
        case 'end':
          this.exhausted = true;
          break;
      }
    }
    return null;
  }
}

/**
 * Queue-backed `ResultSetStream`. The driver side calls `Push`; the loop
 * side uses the `ResultSetStream` methods.
 */
export class EventResultStream implements ResultSetStream {
  private readonly queue: StreamEvent[] = [];
  private waiter: (() => void) | null = null;
  private paused = false;
  private current: StreamedResultSet | null = null;
  private readonly flow: FlowControl | undefined;

  constructor(flow?: FlowControl) {
    this.flow = flow;
  }

  /**
   * Driver side: appends an event. Nothing is accepted after `end`.
   */
  Push(event: StreamEvent): void {
    const last = this.queue[this.queue.length - 1];
    if (last?.Kind === 'end') {
      return;
    }
    this.queue.push(event);

    if (!this.paused && this.flow && this.queue.length >= HIGH_WATERMARK) {
      this.paused = true;
      this.flow.Pause();
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter();
    }
  }

  /**
   * Waits for the first result set boundary.
   *
   * Engine errors that are followed by further results are skipped: they
   * were already shown by the message handler and the server went on with
   * the rest of the batch. An engine error followed only by the end of the
   * batch rejects, as does any other error before the first result.
   */
  async Ready(): Promise<void> {
    let engineError: EngineError | null = null;
    for (;;) {
      const event = await this.Peek();
      if (event.Kind === 'error') {
        this.Take();
        if (event.Error instanceof EngineError) {
          engineError = event.Error;
          continue;
        }
        throw event.Error;
      }
      if (event.Kind === 'end' && engineError) {
        throw engineError;
      }
      this.current = this.open();
      return;
    }
  }

  Current(): ResultSet {
    if (!this.current) {
      throw new Error('Result stream is not ready. Await Ready() first.');
    }
    return this.current;
  }

  async HasNext(): Promise<boolean> {
    const current = this.current;
    if (!current) {
      throw new Error('Result stream is not ready. Await Ready() first.');
    }
    if (!current.Exhausted) {
      // Drain whatever the loop left unread of the current set. Column-less
      // sets are never read by the renderer, so a failing statement after an
      // INSERT/UPDATE surfaces here.
      try {
        while ((await current.NextRow()) !== null) {
          // discard
        }
      } catch (err) {
        // Engine errors were already printed by the message handler
        if (!(err instanceof EngineError)) {
          throw err;
        }
      }
    }

    for (;;) {
      const event = await this.Peek();
      if (event.Kind === 'end') {
        return false;
      }
      if (event.Kind === 'error' && event.Error instanceof EngineError) {
        // Already printed; the server carries on with the next statement
        this.Take();
        continue;
      }
      return true;
    }
  }

  async Advance(): Promise<void> {
    const event = await this.Peek();
    if (event.Kind === 'end') {
      throw new ResultSetAdvanceError('No further result sets are pending');
    }
    if (event.Kind === 'error') {
      this.Take();
      throw new ResultSetAdvanceError(
        `Failed to advance to the next result set: ${event.Error.message}`,
        event.Error
      );
    }
    this.current = this.open();
  }

  /** Loop side: the next event without consuming it */
  Peek(): Promise<StreamEvent> {
    const head = this.queue[0];
    if (head) {
      return Promise.resolve(head);
    }
    return new Promise<void>((resolve) => {
      this.waiter = resolve;
    }).then(() => this.Peek());
  }

  /** Loop side: consumes the head event */
  Take(): void {
    this.queue.shift();
    if (this.paused && this.flow && this.queue.length <= LOW_WATERMARK) {
      this.paused = false;
      this.flow.Resume();
    }
  }

  /**
   * Opens a result set at the head of the queue: a `columns` event starts a
   * row-returning set, anything else a column-less one.
   */
  private open(): StreamedResultSet {
    const head = this.queue[0];
    if (head?.Kind === 'columns') {
      this.Take();
      return new StreamedResultSet(this, head.Columns);
    }
    if (head?.Kind === 'count') {
      this.Take();
      return new StreamedResultSet(this, [], head.Count);
    }
    return new StreamedResultSet(this, []);
  }
}
