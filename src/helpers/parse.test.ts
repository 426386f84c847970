import { describe, it, expect } from 'vitest';
import { isEnvFileName, parseEnvContent, parseEnvEntries } from './parse';

describe('isEnvFileName', () => {
  it('matches names starting or ending with .env', () => {
    expect(isEnvFileName('.env')).toBe(true);
    expect(isEnvFileName('.env.production')).toBe(true);
    expect(isEnvFileName('config/app.env')).toBe(true);
    expect(isEnvFileName('services/api/.env.local')).toBe(true);
  });

  it('rejects other files', () => {
    expect(isEnvFileName('config.yml')).toBe(false);
    expect(isEnvFileName('envfile')).toBe(false);
    expect(isEnvFileName('.envrc/readme.md')).toBe(false);
  });
});

describe('parseEnvContent', () => {
  it('parses key value pairs', () => {
    expect(parseEnvContent('A=1\nB=two\n')).toEqual({ A: '1', B: 'two' });
  });

  it('skips blank lines, comments and lines without =', () => {
    const content = ['# comment', '', '   ', 'NOT_A_PAIR', 'KEY=value', '  # indented comment'].join('\n');

    expect(parseEnvContent(content)).toEqual({ KEY: 'value' });
  });

  it('splits on the first = and trims both sides', () => {
    expect(parseEnvContent('  URL = postgres://u:p@h/db?x=1  ')).toEqual({ URL: 'postgres://u:p@h/db?x=1' });
  });

  it('keeps quotes as part of the value', () => {
    expect(parseEnvContent('NAME="quoted value"')).toEqual({ NAME: '"quoted value"' });
  });

  it('allows empty values and keeps the empty key', () => {
    expect(parseEnvContent('EMPTY=\n=orphan')).toEqual({ EMPTY: '', '': 'orphan' });
  });

  it('stores keys named like object builtins as plain entries', () => {
    const env = parseEnvContent('__proto__=1\nconstructor=2\n=3\n');

    expect(Object.keys(env)).toEqual(['__proto__', 'constructor', '']);
    expect(env['']).toBe('3');
    expect(Object.getOwnPropertyDescriptor(env, '__proto__')?.value).toBe('1');
  });

  it('lets later duplicates win', () => {
    expect(parseEnvContent('A=1\nA=2')).toEqual({ A: '2' });
  });

  it('handles CRLF line endings and buffers', () => {
    expect(parseEnvContent(Buffer.from('A=1\r\nB=2\r\n'))).toEqual({ A: '1', B: '2' });
  });
});

describe('parseEnvEntries', () => {
  it('merges env files in order and ignores other entries', () => {
    const entries = [
      { path: '.env', content: Buffer.from('A=1\nB=2'), mode: 0o644 },
      { path: 'README.md', content: Buffer.from('C=ignored'), mode: 0o644 },
      { path: 'api/.env.local', content: Buffer.from('B=3\nD=4'), mode: 0o600 }
    ];

    expect(parseEnvEntries(entries)).toEqual({ A: '1', B: '3', D: '4' });
  });

  it('returns an empty map for no env files', () => {
    expect(parseEnvEntries([])).toEqual({});
  });
});
