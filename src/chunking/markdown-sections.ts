import { UNTITLED_SECTION } from '../config/constants';
import type { Section } from './types';
import { normalizeLineEndings } from './utils';

const HEADING_PATTERN = /^(#{1,6})\s+(.+)$/;

/**
 * Splits Markdown into heading-delimited sections. Every ATX heading starts a
 * new section that includes the heading line itself; prose before the first
 * heading becomes an "Untitled" section at level 0.
 */
export function parseMarkdownSections(markdown: string): Section[] {
  const text = normalizeLineEndings(markdown);
  const sections: Section[] = [];

  let bufferStart = 0;
  let title: string | null = null;
  let level = 0;

  const flush = (end: number): void => {
    const raw = text.slice(bufferStart, end);
    if (raw.length === 0) return;
    sections.push({
      title: title ?? UNTITLED_SECTION,
      content: raw.trim(),
      level,
      start: bufferStart + (raw.length - raw.trimStart().length),
    });
  };

  let offset = 0;
  for (const line of text.split('\n')) {
    const match = HEADING_PATTERN.exec(line);
    if (match && match[1] && match[2]) {
      flush(offset);
      bufferStart = offset;
      level = match[1].length;
      title = match[2].trim();
    }
    offset += line.length + 1;
  }
  flush(text.length);

  return sections;
}
