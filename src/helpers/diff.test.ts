import { describe, it, expect } from 'vitest';
import { diffEnvMaps, generateReadableDiff, hasChanges, summarizeDiff } from './diff';

describe('diffEnvMaps', () => {
  it('classifies added, removed and unchanged keys', () => {
    const diff = diffEnvMaps({ A: '1', B: '2' }, { B: '2', C: '3' });

    expect(diff).toEqual({ added: { C: '3' }, removed: { A: '1' }, changed: {} });
  });

  it('reports changed values with old and new', () => {
    const diff = diffEnvMaps({ HOST: 'localhost', PORT: '3000' }, { HOST: 'db.internal', PORT: '3000' });

    expect(diff.changed).toEqual({ HOST: { oldValue: 'localhost', newValue: 'db.internal' } });
    expect(diff.added).toEqual({});
    expect(diff.removed).toEqual({});
  });

  it('treats an empty value as a value', () => {
    const diff = diffEnvMaps({ FLAG: '' }, { FLAG: 'on', EMPTY: '' });

    expect(diff.changed).toEqual({ FLAG: { oldValue: '', newValue: 'on' } });
    expect(diff.added).toEqual({ EMPTY: '' });
  });

  it('keeps keys containing / and ~ intact', () => {
    const diff = diffEnvMaps({ 'a/b': '1' }, { 'c~d': '2' });

    expect(diff.added).toEqual({ 'c~d': '2' });
    expect(diff.removed).toEqual({ 'a/b': '1' });
  });

  it('returns an empty diff for identical maps', () => {
    const diff = diffEnvMaps({ A: '1' }, { A: '1' });

    expect(hasChanges(diff)).toBe(false);
  });
});

describe('generateReadableDiff', () => {
  it('lists added, removed and changed keys in sorted order', () => {
    const diff = diffEnvMaps({ Z: '1', A: 'old', M: 'x' }, { A: 'new', M: 'x', B: '2', C: '3' });

    expect(generateReadableDiff(diff)).toEqual(['+ B=2', '+ C=3', '- Z=1', '~ A: old -> new']);
  });

  it('returns no lines for an empty diff', () => {
    expect(generateReadableDiff({ added: {}, removed: {}, changed: {} })).toEqual([]);
  });
});

describe('summarizeDiff', () => {
  it('counts each kind of change', () => {
    const diff = diffEnvMaps({ A: '1', B: '2' }, { B: '3', C: '4', D: '5' });

    expect(summarizeDiff(diff)).toBe('+2 -1 ~1');
    expect(hasChanges(diff)).toBe(true);
  });
});
