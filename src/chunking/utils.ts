import type { TextSpan, TokenEstimator } from './types';

const CHARS_PER_TOKEN = 4;
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/g;

export const SEGMENT_SEPARATOR = '\n\n';

/**
 * Rough token estimate: one token per four characters, zero for blank text.
 */
export const estimateTokens: TokenEstimator = (text) => {
  if (!text.trim()) {
    return 0;
  }
  return Math.ceil(text.length / CHARS_PER_TOKEN);
};

export function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/**
 * Splits on blank lines. Offsets point at the trimmed paragraph inside `text`.
 */
export function splitIntoParagraphs(text: string): TextSpan[] {
  const spans: TextSpan[] = [];
  let cursor = 0;

  for (const part of text.split(SEGMENT_SEPARATOR)) {
    const trimmed = part.trim();
    if (trimmed) {
      spans.push({ text: trimmed, offset: cursor + (part.length - part.trimStart().length) });
    }
    cursor += part.length + SEGMENT_SEPARATOR.length;
  }

  return spans;
}

/**
 * Splits after `.`, `!` or `?` followed by whitespace. `baseOffset` is added to
 * every span so offsets stay relative to the enclosing text.
 */
export function splitIntoSentences(text: string, baseOffset = 0): TextSpan[] {
  const spans: TextSpan[] = [];
  let cursor = 0;

  const push = (end: number): void => {
    const sentence = text.slice(cursor, end);
    if (sentence.trim()) {
      spans.push({ text: sentence, offset: baseOffset + cursor });
    }
  };

  for (const match of text.matchAll(SENTENCE_BOUNDARY)) {
    const index = match.index ?? 0;
    push(index);
    cursor = index + match[0].length;
  }
  push(text.length);

  return spans;
}
