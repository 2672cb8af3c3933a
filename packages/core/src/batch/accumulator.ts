/**
 * @module batch/accumulator
 * Folds lines into a batch until the terminator matches.
 */

import { EndOfInputError } from '../core/errors';
import { MatchTerminator } from './terminator';

/**
 * Result of feeding one line.
 */
export interface FeedResult {
  /** The batch text so far (final text when `Done` is true) */
  Batch: string;

  /** True once the terminator matched; the accumulator is then spent */
  Done: boolean;
}

/**
 * Line-by-line reducer for one batch.
 *
 * Lines are joined with `\n`. The line that carries the terminator is
 * appended with the terminator stripped and no trailing newline; when
 * stripping leaves it empty it is dropped. A fresh accumulator is needed
 * for every batch.
 */
export class BatchAccumulator {
  private readonly terminator: RegExp;
  private lines: string[] = [];
  private done = false;

  /**
   * @param terminator - End-anchored pattern from `CompileTerminator`
   */
  constructor(terminator: RegExp) {
    this.terminator = terminator;
  }

  /**
   * Adds a line to the batch.
   * @throws Error if called after the batch was finalized
   */
  Feed(line: string): FeedResult {
    if (this.done) {
      throw new Error('Batch already finalized. Start a new BatchAccumulator for the next batch.');
    }

    const match = MatchTerminator(this.terminator, line);
    if (!match.Matched) {
      this.lines.push(line);
    } else {
      this.done = true;
      // A separator on its own line (`go`) leaves nothing to append
      if (match.Line.length > 0 || this.lines.length === 0) {
        this.lines.push(match.Line);
      }
    }
    return { Batch: this.lines.join('\n'), Done: this.done };
  }

  /** Text accumulated so far */
  get Pending(): string {
    return this.lines.join('\n');
  }

  /** True when no line has been fed yet */
  get IsEmpty(): boolean {
    return this.lines.length === 0;
  }

  /**
   * Builds the end-of-input condition for this accumulator, carrying any
   * unterminated text as its payload.
   */
  EndOfInput(): EndOfInputError {
    return new EndOfInputError(this.IsEmpty ? undefined : this.Pending);
  }
}
