import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError } from '@sqlbatch/core';
import { LoadConfig, ParseServerAddress, ParseTheme } from '../config-loader';

const dirs: string[] = [];

function workspace(files: Record<string, string> = {}): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sqlbatch-config-'));
  dirs.push(dir);
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), content);
  }
  return dir;
}

afterEach(() => {
  for (const dir of dirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('ParseServerAddress', () => {
  it('splits a numeric port', () => {
    expect(ParseServerAddress('db01:1500')).toEqual({ Server: 'db01', Port: 1500 });
  });

  it('leaves a plain host alone', () => {
    expect(ParseServerAddress('db01')).toEqual({ Server: 'db01' });
  });

  it('leaves a non-numeric suffix alone', () => {
    expect(ParseServerAddress('db01:abc')).toEqual({ Server: 'db01:abc' });
  });

  it('leaves IPv6 addresses alone', () => {
    expect(ParseServerAddress('::1')).toEqual({ Server: '::1' });
  });
});

describe('ParseTheme', () => {
  it('accepts known themes', () => {
    expect(ParseTheme('ASCIICompact')).toBe('ASCIICompact');
    expect(ParseTheme('UtfCompact')).toBe('UtfCompact');
  });

  it('rejects unknown themes', () => {
    expect(() => ParseTheme('Fancy')).toThrow(ConfigurationError);
  });
});

describe('LoadConfig', () => {
  it('applies defaults to a minimal command line', () => {
    const config = LoadConfig({ Server: 'db01', User: 'sa' }, workspace(), {});

    expect(config.Database).toEqual({
      Server: 'db01',
      Port: 1433,
      Database: 'master',
      User: 'sa',
      Password: '',
      Options: {
        Encrypt: false,
        TrustServerCertificate: true,
        ClientHostname: undefined,
        PacketSize: undefined,
        Language: undefined,
        RequestTimeout: 0,
        ConnectionTimeout: 30000,
      },
    });
    expect(config.Display?.Theme).toBeUndefined();
  });

  it('takes the port from the server address', () => {
    const config = LoadConfig({ Server: 'db01:1500', User: 'sa' }, workspace(), { SQLBATCH_PORT: '1600' });
    expect(config.Database.Server).toBe('db01');
    expect(config.Database.Port).toBe(1500);
  });

  it('converts timeouts from seconds', () => {
    const config = LoadConfig({ Server: 'db01', User: 'sa', LoginTimeout: 5, CommandTimeout: 60 }, workspace(), {});
    expect(config.Database.Options?.ConnectionTimeout).toBe(5000);
    expect(config.Database.Options?.RequestTimeout).toBe(60000);
  });

  it('treats a zero login timeout as the default', () => {
    const config = LoadConfig({ Server: 'db01', User: 'sa', LoginTimeout: 0, CommandTimeout: 0 }, workspace(), {});
    expect(config.Database.Options?.ConnectionTimeout).toBe(30000);
    expect(config.Database.Options?.RequestTimeout).toBe(0);
  });

  it('reads the environment', () => {
    const config = LoadConfig({}, workspace(), {
      SQLBATCH_SERVER: 'envhost',
      SQLBATCH_PORT: '1601',
      SQLBATCH_USER: 'envuser',
      SQLBATCH_PASSWORD: 'test-secret',
      SQLBATCH_TERMINATOR: '^run',
      SQLBATCH_THEME: 'ASCIICompact',
    });
    expect(config.Database.Server).toBe('envhost');
    expect(config.Database.Port).toBe(1601);
    expect(config.Database.User).toBe('envuser');
    expect(config.Database.Password).toBe('test-secret');
    expect(config.Input?.Terminator).toBe('^run');
    expect(config.Display?.Theme).toBe('ASCIICompact');
  });

  it('prefers flags over the environment', () => {
    const config = LoadConfig({ Server: 'flaghost', User: 'flaguser' }, workspace(), {
      SQLBATCH_SERVER: 'envhost',
      SQLBATCH_USER: 'envuser',
    });
    expect(config.Database.Server).toBe('flaghost');
    expect(config.Database.User).toBe('flaguser');
  });

  it('reads a .env file below the process environment', () => {
    const cwd = workspace({ '.env': 'SQLBATCH_SERVER=dotenvhost\nSQLBATCH_USER=dotenvuser\n' });
    const config = LoadConfig({}, cwd, { SQLBATCH_USER: 'envuser' });
    expect(config.Database.Server).toBe('dotenvhost');
    expect(config.Database.User).toBe('envuser');
  });

  it('reads a camelCase config file', () => {
    const cwd = workspace({
      'sqlbatch.json': JSON.stringify({
        database: { server: 'filehost', port: 1700, user: 'fileuser', options: { encrypt: true } },
        input: { terminator: '^go', echoInput: true },
        display: { pageSize: 50, theme: 'ASCIICompact', noHeader: true },
      }),
    });
    const config = LoadConfig({}, cwd, {});

    expect(config.Database.Server).toBe('filehost');
    expect(config.Database.Port).toBe(1700);
    expect(config.Database.User).toBe('fileuser');
    expect(config.Database.Options?.Encrypt).toBe(true);
    expect(config.Input?.Terminator).toBe('^go');
    expect(config.Input?.EchoInput).toBe(true);
    expect(config.Display?.PageSize).toBe(50);
    expect(config.Display?.Theme).toBe('ASCIICompact');
    expect(config.Display?.NoHeader).toBe(true);
  });

  it('prefers the environment over the config file', () => {
    const cwd = workspace({
      'sqlbatch.json': JSON.stringify({ Database: { Server: 'filehost', User: 'fileuser' } }),
    });
    const config = LoadConfig({}, cwd, { SQLBATCH_SERVER: 'envhost' });
    expect(config.Database.Server).toBe('envhost');
    expect(config.Database.User).toBe('fileuser');
  });

  it('loads an explicit config file', () => {
    const cwd = workspace({
      'other.json': JSON.stringify({ Database: { Server: 'otherhost', User: 'sa' } }),
    });
    expect(LoadConfig({ Config: 'other.json' }, cwd, {}).Database.Server).toBe('otherhost');
  });

  it('rejects a missing explicit config file', () => {
    expect(() => LoadConfig({ Config: 'missing.json' }, workspace(), {})).toThrow('Config file not found');
  });

  it('rejects malformed config files', () => {
    expect(() => LoadConfig({}, workspace({ 'sqlbatch.json': '{ nope' }), {})).toThrow(ConfigurationError);
    expect(() => LoadConfig({}, workspace({ 'sqlbatch.json': '[1, 2]' }), {})).toThrow(
      'must contain a JSON object'
    );
  });

  it('requires a server', () => {
    expect(() => LoadConfig({ User: 'sa' }, workspace(), {})).toThrow(
      'Server is required. Set via -S, SQLBATCH_SERVER env var, or config file.'
    );
  });

  it('requires a user', () => {
    expect(() => LoadConfig({ Server: 'db01' }, workspace(), {})).toThrow(
      'User is required. Set via -U, SQLBATCH_USER env var, or config file.'
    );
  });

  it('rejects an unknown theme', () => {
    expect(() => LoadConfig({ Server: 'db01', User: 'sa', Theme: 'Fancy' }, workspace(), {})).toThrow(
      ConfigurationError
    );
  });
});
