import type { ChatMessage, MatchResult } from './types.js';

const NO_MATCH: MatchResult = { kind: 'no_match' };

export function normalizeText(input: string): string {
  return input.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Trims keywords, drops empty ones and removes case-insensitive duplicates.
 * The first spelling of a duplicate is kept.
 */
export function normalizeKeywords(keywords: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const keyword of keywords) {
    const cleaned = keyword.trim();
    if (!cleaned) {
      continue;
    }
    const key = normalizeText(cleaned);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(cleaned);
  }
  return result;
}

/**
 * Substring match over normalized text. Not word-boundary aware, so "cat"
 * matches "category". The first matching keyword in configured order wins.
 */
export function matchKeywords(text: string | undefined, keywords: readonly string[]): MatchResult {
  const haystack = normalizeText(text ?? '');
  if (!haystack || keywords.length === 0) {
    return NO_MATCH;
  }

  for (const keyword of keywords) {
    const needle = normalizeText(keyword);
    if (needle && haystack.includes(needle)) {
      return { kind: 'matched', keyword };
    }
  }

  return NO_MATCH;
}

export function messageText(message: Pick<ChatMessage, 'text' | 'caption'>): string {
  return [message.text, message.caption].filter((part): part is string => Boolean(part)).join('\n');
}
