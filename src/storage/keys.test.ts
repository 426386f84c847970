import { describe, it, expect } from 'vitest';
import { buildStorageKey, isNotFoundStatus, tagFromStorageKey, tagsFromStorageKeys } from './keys';

describe('buildStorageKey', () => {
  it('appends .env to the tag', () => {
    expect(buildStorageKey('', 'v1.0.0')).toBe('v1.0.0.env');
    expect(buildStorageKey(undefined, 'main')).toBe('main.env');
  });

  it('concatenates the prefix verbatim', () => {
    expect(buildStorageKey('envs/', 'v1.0.0')).toBe('envs/v1.0.0.env');
    expect(buildStorageKey('prefix', 'test')).toBe('prefixtest.env');
  });

  it('does not escape the tag', () => {
    expect(buildStorageKey('envs/', 'feature/login')).toBe('envs/feature/login.env');
  });
});

describe('tagFromStorageKey', () => {
  it('strips prefix and suffix', () => {
    expect(tagFromStorageKey('envs/', 'envs/v1.0.0.env')).toBe('v1.0.0');
    expect(tagFromStorageKey('', 'feature/login.env')).toBe('feature/login');
  });

  it('ignores keys outside the prefix or without the suffix', () => {
    expect(tagFromStorageKey('envs/', 'other/v1.env')).toBeUndefined();
    expect(tagFromStorageKey('envs/', 'envs/readme.txt')).toBeUndefined();
    expect(tagFromStorageKey('envs/', 'envs/.env')).toBeUndefined();
  });

  it('collects tags from a key list', () => {
    expect(tagsFromStorageKeys('p/', ['p/a.env', 'q/b.env', 'p/c.env'])).toEqual(['a', 'c']);
  });
});

describe('isNotFoundStatus', () => {
  it('recognises 404 responses from each SDK shape', () => {
    expect(isNotFoundStatus({ statusCode: 404 })).toBe(true);
    expect(isNotFoundStatus({ code: 404 })).toBe(true);
    expect(isNotFoundStatus({ $metadata: { httpStatusCode: 404 } })).toBe(true);
  });

  it('rejects other errors', () => {
    expect(isNotFoundStatus({ statusCode: 500 })).toBe(false);
    expect(isNotFoundStatus({ code: 'ENOENT' })).toBe(false);
    expect(isNotFoundStatus(new Error('boom'))).toBe(false);
    expect(isNotFoundStatus(null)).toBe(false);
  });
});
