import { createHash } from 'crypto';

/** Collapse runs of whitespace into single spaces and trim. */
export function cleanText(text: string | null | undefined): string {
  if (!text) return '';
  return text.replace(/\s+/g, ' ').trim();
}

const SENTENCE_TERMINATORS = new Set(['.', '!', '?']);

/**
 * Index just past the last sentence boundary at or before `limit`:
 * a terminator followed by whitespace (or end of text), or a line break.
 * Returns -1 when there is none.
 */
function lastSentenceBoundary(text: string, limit: number): number {
  for (let i = Math.min(limit, text.length) - 1; i >= 0; i--) {
    const ch = text[i];
    if (ch === '\n') {
      if (text.slice(0, i).trim()) return i;
      continue;
    }
    if (SENTENCE_TERMINATORS.has(ch)) {
      const next = text[i + 1];
      if (next === undefined || /\s/.test(next)) return i + 1;
    }
  }
  return -1;
}

/**
 * Shorten `text` to at most `maxChars`, cutting at the nearest preceding
 * sentence boundary. Falls back to a word boundary, then a hard cut, when the
 * first sentence alone exceeds the budget. Idempotent for a given budget.
 */
export function truncateAtSentence(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;

  const sentenceCut = lastSentenceBoundary(text, maxChars);
  if (sentenceCut > 0) return text.slice(0, sentenceCut).trimEnd();

  const window = text.slice(0, maxChars);
  const lastSpace = window.search(/\s\S*$/);
  if (lastSpace > 0) return window.slice(0, lastSpace).trimEnd();

  return window;
}

/** Stable short content hash used to version derived records. */
export function contentHash(text: string, length = 16): string {
  return createHash('sha256').update(text, 'utf8').digest('hex').slice(0, length);
}
