/**
 * @module executor/output
 * Buffered text output for query results.
 */

import * as fs from 'fs';
import { Writable } from 'stream';
import { ConfigurationError, ToError } from '../core/errors';

/**
 * Collects text and writes it to the underlying stream on `Flush()`.
 *
 * Results, echoed input and server messages all go through the same sink,
 * so they come out in the order they were produced.
 */
export class OutputSink {
  private readonly stream: Writable;
  private readonly ownsStream: boolean;
  private buffer: string[] = [];
  private failure: Error | null = null;

  /**
   * @param stream - Destination stream
   * @param ownsStream - End the stream on `Close()`. Leave false for stdout
   */
  constructor(stream: Writable, ownsStream: boolean = false) {
    this.stream = stream;
    this.ownsStream = ownsStream;
    // Reported by the next Flush() instead of crashing the process
    stream.on('error', (err: Error) => {
      this.failure = err;
    });
  }

  /**
   * Opens `filePath` for writing, truncating it if it exists and creating it
   * otherwise.
   */
  static async ToFile(filePath: string): Promise<OutputSink> {
    let handle: fs.promises.FileHandle;
    try {
      handle = await fs.promises.open(filePath, 'w');
    } catch (err) {
      throw new ConfigurationError(`Cannot open output file ${filePath}: ${ToError(err).message}`, ToError(err));
    }
    return new OutputSink(handle.createWriteStream({ encoding: 'utf-8' }), true);
  }

  Write(text: string): void {
    this.buffer.push(text);
  }

  WriteLine(text: string = ''): void {
    this.buffer.push(text + '\n');
  }

  /**
   * Writes everything buffered so far and waits until the stream accepted it.
   */
  async Flush(): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    if (this.buffer.length === 0) {
      return;
    }
    const text = this.buffer.join('');
    this.buffer = [];
    await new Promise<void>((resolve, reject) => {
      this.stream.write(text, (err) => (err ? reject(err) : resolve()));
    });
  }

  async Close(): Promise<void> {
    await this.Flush();
    if (this.ownsStream) {
      await new Promise<void>((resolve) => {
        this.stream.end(() => resolve());
      });
    }
  }
}
