import { describe, it, expect } from 'vitest';
import { resolveConfig, ShellConfig } from '../core/config';
import { ConfigurationError } from '../core/errors';

const minimalConfig: ShellConfig = {
  Database: {
    Server: 'localhost',
    Database: 'master',
    User: 'sa',
    Password: 'test-secret',
  },
};

describe('resolveConfig', () => {
  it('applies the default terminator', () => {
    expect(resolveConfig(minimalConfig).Input.Terminator).toBe(';|^go');
  });

  it('applies the default page size', () => {
    expect(resolveConfig(minimalConfig).Display.PageSize).toBe(3000);
  });

  it('applies the default column separator', () => {
    expect(resolveConfig(minimalConfig).Display.ColumnSeparator).toBe(' ');
  });

  it('applies the default theme', () => {
    expect(resolveConfig(minimalConfig).Display.Theme).toBe('UtfCompact');
  });

  it('turns echo and header suppression off by default', () => {
    const resolved = resolveConfig(minimalConfig);
    expect(resolved.Input.EchoInput).toBe(false);
    expect(resolved.Input.NoPromptInEcho).toBe(false);
    expect(resolved.Display.NoHeader).toBe(false);
  });

  it('reads interactively when no file is given', () => {
    const resolved = resolveConfig(minimalConfig);
    expect(resolved.Input.File).toBeUndefined();
    expect(resolved.Display.OutputFile).toBeUndefined();
  });

  it('preserves user-specified values', () => {
    const resolved = resolveConfig({
      ...minimalConfig,
      Input: { Terminator: '^run', File: 'a.sql', EchoInput: true, NoPromptInEcho: true },
      Display: { PageSize: 10, ColumnSeparator: ' | ', NoHeader: true, Theme: 'ASCIICompact', OutputFile: 'out.txt' },
    });
    expect(resolved.Input).toEqual({
      Terminator: '^run',
      File: 'a.sql',
      EchoInput: true,
      NoPromptInEcho: true,
      HistoryFile: undefined,
    });
    expect(resolved.Display).toEqual({
      PageSize: 10,
      ColumnSeparator: ' | ',
      NoHeader: true,
      Theme: 'ASCIICompact',
      OutputFile: 'out.txt',
    });
  });

  it('freezes the resolved value', () => {
    const resolved = resolveConfig(minimalConfig);
    expect(Object.isFrozen(resolved)).toBe(true);
    expect(Object.isFrozen(resolved.Input)).toBe(true);
    expect(Object.isFrozen(resolved.Display)).toBe(true);
  });

  it('rejects a non-positive page size', () => {
    expect(() => resolveConfig({ ...minimalConfig, Display: { PageSize: 0 } })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ ...minimalConfig, Display: { PageSize: 2.5 } })).toThrow(ConfigurationError);
  });
});
