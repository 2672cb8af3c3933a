/**
 * @module batch/source
 * Where batches come from.
 */

/**
 * Produces finalized batches, one per call.
 */
export interface BatchSource {
  /**
   * Reads lines until the terminator matches and returns the batch text.
   *
   * @param terminator - End-anchored pattern from `CompileTerminator`
   * @throws EndOfInputError when the input is exhausted
   * @throws SourceReadError when the input cannot be read
   */
  ReadBatch(terminator: RegExp): Promise<string>;

  /** Releases the underlying stream or terminal */
  Close(): Promise<void>;
}

/**
 * Subscription to user interrupts (Ctrl-C) outside of line reading.
 */
export interface InterruptNotifier {
  /**
   * Registers a listener and returns the function that removes it.
   */
  Subscribe(listener: () => void): () => void;
}

/**
 * A source that can also report user interrupts while a batch executes.
 * Only the interactive source has this capability.
 */
export interface InterruptibleSource extends BatchSource {
  readonly Interrupts: InterruptNotifier;
}

export function IsInterruptible(source: BatchSource): source is InterruptibleSource {
  return 'Interrupts' in source;
}
