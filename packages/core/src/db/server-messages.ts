/**
 * @module db/server-messages
 * Printing policy for server diagnostics.
 *
 * Informational messages (severity 10 and below) are shown as the server
 * sent them. Statistics and showplan messages arrive pre-formatted, with
 * their own line breaks, and are written verbatim. Everything above
 * severity 10 is an error: it is printed with its header and fails the
 * current operation.
 */

import { ServerMessage } from './session';

/** Highest severity that is still informational */
export const INFORMATIONAL_SEVERITY = 10;

/**
 * Message number ranges whose text is already laid out by the server:
 * statistics io/time (3612-3615) and showplan output (6201-6299, 10201-10299).
 */
const PREFORMATTED_RANGES: ReadonlyArray<readonly [number, number]> = [
  [3612, 3615],
  [6201, 6299],
  [10201, 10299],
];

function isPreformatted(number: number): boolean {
  return PREFORMATTED_RANGES.some(([low, high]) => number >= low && number <= high);
}

/**
 * Formats a server error the way `isql` shows it:
 *
 * ```
 * Msg 208, Level 16, State 1:
 * Server 'db01', Line 1:
 * Invalid object name 'nope'.
 * ```
 */
export function FormatServerError(message: ServerMessage): string {
  let header = `Msg ${message.Number}, Level ${message.Severity}, State ${message.State}:\n`;
  if (message.ServerName) {
    const location = [`Server '${message.ServerName}'`];
    if (message.ProcName) {
      location.push(`Procedure '${message.ProcName}'`);
    }
    if (message.LineNumber !== undefined) {
      location.push(`Line ${message.LineNumber}`);
    }
    header += location.join(', ') + ':\n';
  }
  return header + message.Text.replace(/\s+$/, '') + '\n';
}

/**
 * Writes a server message according to the printing policy.
 *
 * @param message - The message received from the server
 * @param write - Destination for the text (written without an added newline)
 * @returns true when the message signals that the operation failed
 */
export function HandleServerMessage(message: ServerMessage, write: (text: string) => void): boolean {
  if (message.Severity > INFORMATIONAL_SEVERITY) {
    write(FormatServerError(message));
    return true;
  }

  if (message.Severity === INFORMATIONAL_SEVERITY && isPreformatted(message.Number)) {
    write(message.Text);
  } else {
    write(message.Text.replace(/\s+$/, '') + '\n');
  }
  return false;
}
