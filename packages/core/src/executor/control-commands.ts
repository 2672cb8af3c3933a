/**
 * @module executor/control-commands
 * Transaction control commands typed in place of a batch.
 */

import { DatabaseSession } from '../db/session';
import { EngineError, ToError } from '../core/errors';

/**
 * Reserved batch texts. Matched exactly and case-sensitively; they are never
 * sent to the server as SQL.
 */
export const CONTROL_COMMANDS = {
  Begin: '\\b',
  Commit: '\\c',
  Rollback: '\\r',
} as const;

export type ControlCommand = (typeof CONTROL_COMMANDS)[keyof typeof CONTROL_COMMANDS];

export function IsControlCommand(batch: string): batch is ControlCommand {
  return batch === CONTROL_COMMANDS.Begin || batch === CONTROL_COMMANDS.Commit || batch === CONTROL_COMMANDS.Rollback;
}

/**
 * Intercepts control commands before submission and runs the matching
 * session primitive.
 */
export class ControlCommandDispatcher {
  private readonly session: DatabaseSession;
  private readonly onError: ((message: string) => void) | undefined;

  constructor(session: DatabaseSession, onError?: (message: string) => void) {
    this.session = session;
    this.onError = onError;
  }

  /**
   * Runs `batch` if it is a control command.
   *
   * @returns true when the batch was a control command and has been handled,
   *   whether or not the primitive succeeded
   */
  async Dispatch(batch: string): Promise<boolean> {
    if (!IsControlCommand(batch)) {
      return false;
    }

    try {
      switch (batch) {
        case CONTROL_COMMANDS.Begin:
          await this.session.Begin();
          break;
        case CONTROL_COMMANDS.Commit:
          await this.session.Commit();
          break;
        case CONTROL_COMMANDS.Rollback:
          await this.session.Rollback();
          break;
      }
    } catch (err) {
      // Engine errors were already printed by the server message handler
      if (!(err instanceof EngineError)) {
        this.onError?.(ToError(err).message);
      }
    }
    return true;
  }
}
