/**
 * @module batch/line-reader
 * Pull-style line reading over a readable stream.
 */

import * as readline from 'readline';
import { Readable } from 'stream';

const MAX_QUEUED_LINES = 1000;

/**
 * Reads a stream one line at a time.
 *
 * `\n` and `\r\n` both end a line, and a final line without a trailing
 * newline is still delivered. Stream errors surface from the next `Next()`.
 */
export class LineReader {
  private readonly rl: readline.Interface;
  private readonly input: Readable;
  private readonly queue: string[] = [];
  private closed = false;
  private failure: Error | null = null;
  private waiter: (() => void) | null = null;

  constructor(input: Readable) {
    this.input = input;
    this.rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });

    this.rl.on('line', (line) => {
      this.queue.push(line);
      if (this.queue.length >= MAX_QUEUED_LINES) {
        this.rl.pause();
      }
      this.wake();
    });
    this.rl.on('close', () => {
      this.closed = true;
      this.wake();
    });
    const fail = (err: Error) => {
      this.failure = err;
      this.wake();
    };
    input.on('error', fail);
    this.rl.on('error', fail);
  }

  private wake(): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter();
    }
  }

  /**
   * Resolves the next line, or `null` once the stream has ended.
   * @throws the stream's error if reading failed
   */
  async Next(): Promise<string | null> {
    for (;;) {
      const line = this.queue.shift();
      if (line !== undefined) {
        if (this.queue.length < MAX_QUEUED_LINES / 10 && !this.closed) {
          this.rl.resume();
        }
        return line;
      }
      if (this.failure) {
        throw this.failure;
      }
      if (this.closed) {
        return null;
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  /** Stops reading and releases the stream */
  Close(): void {
    this.rl.close();
    this.input.destroy();
  }
}
