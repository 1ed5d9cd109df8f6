import { describe, it, expect } from 'vitest';
import { cleanText, contentHash, truncateAtSentence } from '@roleradar/core';

describe('truncateAtSentence', () => {
  const text = 'First sentence. Second sentence. Third sentence.';

  it('returns text within budget unchanged', () => {
    expect(truncateAtSentence(text, 100)).toBe(text);
  });

  it('cuts at the last sentence end inside the budget', () => {
    expect(truncateAtSentence(text, 35)).toBe('First sentence. Second sentence.');
  });

  it('is idempotent', () => {
    const once = truncateAtSentence(text, 35);
    expect(truncateAtSentence(once, 35)).toBe(once);
  });

  it('cuts a long resume on a sentence end and is stable when cut again', () => {
    const sentences: string[] = [];
    for (let i = 1; sentences.join(' ').length < 6000; i++) {
      sentences.push(`Role ${i} involved delivering project milestones for a regional client.`);
    }
    const resume = sentences.join(' ');

    const cut = truncateAtSentence(resume, 5000);

    expect(resume.length).toBeGreaterThan(5000);
    expect(cut.length).toBeLessThanOrEqual(5000);
    expect(cut.length).toBeGreaterThan(4900);
    expect(cut.endsWith('regional client.')).toBe(true);
    expect(resume.startsWith(cut)).toBe(true);
    expect(truncateAtSentence(cut, 5000)).toBe(cut);
  });

  it('treats a line break as a boundary', () => {
    expect(truncateAtSentence('Line one\nLine two is long', 15)).toBe('Line one');
  });

  it('does not split on a decimal point', () => {
    expect(truncateAtSentence('Costs 2.5 million dollars', 12)).toBe('Costs 2.5');
  });

  it('falls back to a word boundary', () => {
    expect(truncateAtSentence('abcdefghij klmnop', 12)).toBe('abcdefghij');
  });

  it('hard-cuts a single long word', () => {
    expect(truncateAtSentence('a'.repeat(20), 5)).toBe('aaaaa');
  });
});

describe('cleanText', () => {
  it('collapses whitespace', () => {
    expect(cleanText('  Senior\n\t Engineer  ')).toBe('Senior Engineer');
    expect(cleanText(undefined)).toBe('');
  });
});

describe('contentHash', () => {
  it('is a stable 16-char hex digest', () => {
    const hash = contentHash('resume text');
    expect(hash).toMatch(/^[0-9a-f]{16}$/);
    expect(contentHash('resume text')).toBe(hash);
    expect(contentHash('resume text.')).not.toBe(hash);
  });
});
