import { describe, expect, it } from 'vitest';
import { matchKeywords, messageText, normalizeKeywords, normalizeText } from '../src/matcher.js';

describe('matcher', () => {
  it('normalizes case and whitespace', () => {
    expect(normalizeText('  Hello\n\tWORLD  ')).toBe('hello world');
  });

  it('matches case-insensitively across collapsed whitespace', () => {
    expect(matchKeywords('We are HIRING   Remote\nengineers', ['remote engineers'])).toEqual({
      kind: 'matched',
      keyword: 'remote engineers'
    });
  });

  it('returns the first keyword in configured order', () => {
    expect(matchKeywords('deploy and release today', ['release', 'deploy'])).toEqual({ kind: 'matched', keyword: 'release' });
  });

  it('matches substrings, not whole words', () => {
    expect(matchKeywords('new category added', ['cat'])).toEqual({ kind: 'matched', keyword: 'cat' });
  });

  it('never matches empty text or an empty keyword list', () => {
    expect(matchKeywords(undefined, ['x'])).toEqual({ kind: 'no_match' });
    expect(matchKeywords('   ', ['x'])).toEqual({ kind: 'no_match' });
    expect(matchKeywords('something', [])).toEqual({ kind: 'no_match' });
    expect(matchKeywords('something', ['   '])).toEqual({ kind: 'no_match' });
  });

  it('dedupes keywords keeping the first spelling', () => {
    expect(normalizeKeywords([' Rust ', 'rust', '', 'Go', '  ', 'RUST'])).toEqual(['Rust', 'Go']);
  });

  it('joins text and caption for matching', () => {
    expect(messageText({ text: 'a', caption: 'b' })).toBe('a\nb');
    expect(messageText({ caption: 'only caption' })).toBe('only caption');
    expect(messageText({})).toBe('');
  });
});
