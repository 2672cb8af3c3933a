/**
 * @module batch/terminator
 * Decides whether a line ends a batch.
 *
 * The match is purely lexical: the terminator is a caller-supplied regular
 * expression tested against the end of each line. A `;` inside a string
 * literal at the end of a line therefore ends the batch too, the same way
 * `isql` and `sqlcmd` behave with their separators.
 */

import { ConfigurationError } from '../core/errors';

/**
 * Outcome of testing one line against the terminator.
 */
export interface TerminatorMatch {
  /** The line with the matched suffix removed, or the line unchanged */
  Line: string;

  /** Whether the terminator matched at the end of the line */
  Matched: boolean;
}

/**
 * Compiles terminator source text into an end-anchored pattern.
 *
 * The source is wrapped in a group before anchoring so that alternations
 * such as `;|^go` anchor every branch: `(;|^go)$`.
 *
 * @throws ConfigurationError if the source is empty or not a valid pattern
 */
export function CompileTerminator(source: string): RegExp {
  if (source.length === 0) {
    throw new ConfigurationError('Terminator pattern must not be empty');
  }
  try {
    return new RegExp(`(${source})$`);
  } catch (err) {
    throw new ConfigurationError(
      `Invalid terminator pattern "${source}"`,
      err instanceof Error ? err : undefined
    );
  }
}

/**
 * Tests `line` against an end-anchored terminator and strips the match.
 *
 * @example
 * ```typescript
 * const re = CompileTerminator(';|^go');
 * MatchTerminator(re, 'select 1;'); // { Line: 'select 1', Matched: true }
 * MatchTerminator(re, 'go');        // { Line: '', Matched: true }
 * MatchTerminator(re, 'select 1');  // { Line: 'select 1', Matched: false }
 * ```
 */
export function MatchTerminator(pattern: RegExp, line: string): TerminatorMatch {
  // exec on a non-global pattern has no lastIndex state
  const match = pattern.exec(line);
  if (match === null) {
    return { Line: line, Matched: false };
  }
  return { Line: line.slice(0, match.index), Matched: true };
}
