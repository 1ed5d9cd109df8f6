/**
 * Lenient Zod building blocks for model output: models return "5+" for
 * numbers, a comma-separated string for a list, or drop fields entirely.
 */

import { z } from 'zod';
import { cleanText } from '@roleradar/core';

/** Keep the first spelling of each entry, compared case-insensitively. */
export function dedupeCaseInsensitive(items: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of items) {
    const key = item.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(item);
  }
  return out;
}

function toList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  if (typeof value === 'string') return value.split(/[,;\n]/);
  if (Array.isArray(value)) return value;
  return [value];
}

/** Missing → []; string → split on , ; or newline; entries cleaned, blank ones and non-text dropped, de-duplicated. */
export const stringList = z.preprocess(
  toList,
  z.array(z.unknown()).transform((items) =>
    dedupeCaseInsensitive(
      items
        .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
        .map((item) => cleanText(String(item)))
        .filter(Boolean),
    ),
  ),
);

function toNumber(value: unknown, fallback: number | undefined): unknown {
  if (value === undefined || value === null || value === '') return fallback;
  if (typeof value === 'string') {
    const n = Number.parseFloat(value.replace(/[^\d.-]/g, ''));
    return Number.isNaN(n) ? fallback : n;
  }
  return value;
}

/** Number or numeric string ("5+", "72%"); missing or unreadable → `fallback`. */
export const lenientNumber = (fallback: number) =>
  z.preprocess((v) => toNumber(v, fallback), z.number());

/** Like `lenientNumber`, but a missing or unreadable value fails validation. */
export const requiredNumber = z.preprocess((v) => toNumber(v, undefined), z.number());

export const lenientText = z.preprocess(
  (v) => (typeof v === 'string' ? cleanText(v) : ''),
  z.string(),
);

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
