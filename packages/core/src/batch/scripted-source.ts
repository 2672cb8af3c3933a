/**
 * @module batch/scripted-source
 * Reads batches from a script file or any other finite stream.
 */

import * as fs from 'fs';
import { Readable } from 'stream';
import { BatchSource } from './source';
import { BatchAccumulator } from './accumulator';
import { LineReader } from './line-reader';
import { EndOfInputError, SourceReadError, ToError } from '../core/errors';

/**
 * Options for scripted input.
 */
export interface ScriptedSourceOptions {
  /** Report every consumed line through `OnEcho` */
  EchoInput?: boolean;

  /** Echo lines without the `<n>> ` prefix */
  NoPromptInEcho?: boolean;

  /** Receives echoed lines, without a trailing newline */
  OnEcho?: (line: string) => void;
}

/**
 * Sequential batch reader over a finite stream. Has no interrupt
 * capability: a Ctrl-C while a script line is being read is not observed.
 *
 * A script that ends without a final terminator still executes its last
 * batch; the call after that reports end of input.
 */
export class ScriptedSource implements BatchSource {
  private readonly reader: LineReader;
  private readonly options: ScriptedSourceOptions;
  private ended = false;

  constructor(input: Readable, options: ScriptedSourceOptions = {}) {
    this.reader = new LineReader(input);
    this.options = options;
  }

  /**
   * Opens a script file for reading.
   * @throws SourceReadError if the file cannot be opened
   */
  static async FromFile(filePath: string, options: ScriptedSourceOptions = {}): Promise<ScriptedSource> {
    let handle: fs.promises.FileHandle;
    try {
      handle = await fs.promises.open(filePath, 'r');
    } catch (err) {
      throw new SourceReadError(`Cannot open input file ${filePath}: ${ToError(err).message}`, ToError(err));
    }
    return new ScriptedSource(handle.createReadStream({ encoding: 'utf-8' }), options);
  }

  async ReadBatch(terminator: RegExp): Promise<string> {
    if (this.ended) {
      throw new EndOfInputError();
    }

    const accumulator = new BatchAccumulator(terminator);
    let lineNo = 1;

    for (;;) {
      let line: string | null;
      try {
        line = await this.reader.Next();
      } catch (err) {
        throw new SourceReadError(`Failed to read input: ${ToError(err).message}`, ToError(err));
      }

      if (line === null) {
        this.ended = true;
        const eof = accumulator.EndOfInput();
        if (eof.PartialBatch === undefined) {
          throw eof;
        }
        return eof.PartialBatch;
      }

      this.echo(lineNo, line);
      const result = accumulator.Feed(line);
      if (result.Done) {
        return result.Batch;
      }
      lineNo++;
    }
  }

  private echo(lineNo: number, line: string): void {
    if (!this.options.EchoInput || !this.options.OnEcho) {
      return;
    }
    this.options.OnEcho(this.options.NoPromptInEcho ? line : `${lineNo}> ${line}`);
  }

  async Close(): Promise<void> {
    this.reader.Close();
  }
}
