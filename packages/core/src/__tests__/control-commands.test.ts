import { describe, it, expect } from 'vitest';
import { ControlCommandDispatcher, IsControlCommand } from '../executor/control-commands';
import { EngineError, TransactionError } from '../core/errors';
import { FakeSession } from './fakes';

function dispatcher(session: FakeSession, errors: string[]) {
  return new ControlCommandDispatcher(session, (message) => errors.push(message));
}

describe('IsControlCommand', () => {
  it('matches the reserved literals exactly', () => {
    expect(IsControlCommand('\\b')).toBe(true);
    expect(IsControlCommand('\\c')).toBe(true);
    expect(IsControlCommand('\\r')).toBe(true);
    expect(IsControlCommand('\\B')).toBe(false);
    expect(IsControlCommand(' \\b')).toBe(false);
    expect(IsControlCommand('\\b\n')).toBe(false);
    expect(IsControlCommand('begin tran')).toBe(false);
  });
});

describe('ControlCommandDispatcher', () => {
  it('maps each command to its session primitive', async () => {
    const session = new FakeSession();
    const errors: string[] = [];
    const commands = dispatcher(session, errors);

    expect(await commands.Dispatch('\\b')).toBe(true);
    expect(await commands.Dispatch('\\c')).toBe(true);
    expect(await commands.Dispatch('\\r')).toBe(true);
    expect(session.Calls).toEqual(['begin', 'commit', 'rollback']);
    expect(session.Submitted).toEqual([]);
    expect(errors).toEqual([]);
  });

  it('leaves ordinary batches alone', async () => {
    const session = new FakeSession();
    expect(await dispatcher(session, []).Dispatch('select 1')).toBe(false);
    expect(session.Calls).toEqual([]);
  });

  it('reports a failing primitive once', async () => {
    const session = new FakeSession();
    session.TransactionFailure = new TransactionError('No open transaction to commit');
    const errors: string[] = [];

    expect(await dispatcher(session, errors).Dispatch('\\c')).toBe(true);
    expect(errors).toEqual(['No open transaction to commit']);
  });

  it('does not repeat engine errors', async () => {
    const session = new FakeSession();
    session.TransactionFailure = new EngineError(16, 3902, 1, 'The COMMIT TRANSACTION request has no corresponding BEGIN TRANSACTION.');
    const errors: string[] = [];

    expect(await dispatcher(session, errors).Dispatch('\\c')).toBe(true);
    expect(errors).toEqual([]);
  });
});
