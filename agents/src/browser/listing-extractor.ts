/**
 * Listing Extractor - job cards and detail descriptions from result-page HTML
 *
 * Responsibilities:
 * - Find job cards (data-card-type="JobCard", falling back to job-ish <article>s)
 * - Pull title/company/location/salary/etc. from data-automation attributes
 * - Derive a stable id per job and drop duplicates
 * - Detect whether a next results page exists
 * - Extract the full description from a job detail page
 *
 * LLM Usage: None
 */

import { createHash } from 'crypto';
import { parse, type HTMLElement } from 'node-html-parser';
import { cleanText, createLogger } from '@roleradar/core';
import type { JobRecord } from '@roleradar/schemas';

const logger = createLogger('listing-extractor');

export interface ExtractOptions {
  /** Origin used to resolve relative card links. */
  baseUrl: string;
}

export interface SkippedCard {
  index: number;
  reason: string;
}

export interface ExtractionResult {
  records: JobRecord[];
  skipped: SkippedCard[];
}

/** Text of the first `[data-automation=name]` element inside the card, or null. */
function automationText(card: HTMLElement, name: string): string | null {
  const el = card.querySelector(`[data-automation="${name}"]`);
  const text = cleanText(el?.text);
  return text || null;
}

function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    const url = new URL(href, baseUrl);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : null;
  } catch {
    return null;
  }
}

/**
 * Numeric job id when the URL path carries one (`/job/12345678`), otherwise a
 * SHA-1 prefix of the URL without query string or fragment.
 */
export function jobIdFromUrl(url: string): string {
  const parsed = new URL(url);
  const numeric = parsed.pathname.match(/\/job\/(\d+)/);
  if (numeric) return numeric[1];
  const normalized = `${parsed.protocol}//${parsed.host.toLowerCase()}${parsed.pathname.replace(/\/+$/, '')}`;
  return createHash('sha1').update(normalized).digest('hex').slice(0, 16);
}

function findCards(root: HTMLElement): HTMLElement[] {
  const cards = root.querySelectorAll('article[data-card-type="JobCard"]');
  if (cards.length > 0) return cards;
  return root
    .querySelectorAll('article')
    .filter((article) => article.toString().toLowerCase().includes('job'));
}

function parseCard(card: HTMLElement, baseUrl: string): JobRecord | string {
  let title: string | null = null;
  let href: string | undefined;

  const titleEl = card.querySelector('[data-automation="jobTitle"]');
  if (titleEl) {
    title = cleanText(titleEl.text) || null;
    href = titleEl.getAttribute('href') ?? titleEl.querySelector('a')?.getAttribute('href');
  } else {
    const heading = card.querySelector('h3') ?? card.querySelector('h2');
    title = cleanText(heading?.text) || null;
    href = (heading?.querySelector('a') ?? card.querySelector('a'))?.getAttribute('href');
  }

  if (!title) return 'missing title';
  if (!href) return 'missing link';
  const sourceUrl = resolveUrl(href, baseUrl);
  if (!sourceUrl) return `unusable link "${href}"`;

  return {
    id: jobIdFromUrl(sourceUrl),
    title,
    company: automationText(card, 'jobCompany') ?? 'Unknown',
    location: automationText(card, 'jobLocation') ?? 'Unknown',
    salary: automationText(card, 'jobSalary'),
    workType: automationText(card, 'jobWorkType'),
    postedAt: automationText(card, 'jobListingDate'),
    shortDescription: automationText(card, 'jobShortDescription'),
    fullDescription: null,
    sourceUrl,
  };
}

/**
 * Parse every job card on a results page. Cards without a title or link are
 * skipped (and logged); the first card wins when two share an id.
 */
export function extractListings(html: string, options: ExtractOptions): ExtractionResult {
  const root = parse(html);
  const cards = findCards(root);
  const records: JobRecord[] = [];
  const skipped: SkippedCard[] = [];
  const seen = new Set<string>();

  cards.forEach((card, index) => {
    const parsed = parseCard(card, options.baseUrl);
    if (typeof parsed === 'string') {
      skipped.push({ index, reason: parsed });
      logger.warn(`Skipping job card ${index}: ${parsed}`);
      return;
    }
    if (seen.has(parsed.id)) {
      logger.debug(`Dropping duplicate job ${parsed.id}`);
      return;
    }
    seen.add(parsed.id);
    records.push(parsed);
  });

  logger.info(`Extracted ${records.length} job(s) from ${cards.length} card(s)`, {
    skipped: skipped.length,
  });
  return { records, skipped };
}

/** True when the page links to a following results page. */
export function hasNextPage(html: string): boolean {
  const root = parse(html);
  if (root.querySelector('[data-automation="page-next"]')) return true;
  if (root.querySelector('a[rel="next"]')) return true;
  return root
    .querySelectorAll('a[aria-label]')
    .some((a) => /^next/i.test(a.getAttribute('aria-label') ?? ''));
}

/** Block text with one cleaned line per paragraph. */
function blockText(el: HTMLElement): string {
  return el.structuredText
    .split('\n')
    .map((line) => cleanText(line))
    .filter(Boolean)
    .join('\n');
}

/**
 * Full description from a job detail page: the jobAdDetails block, then any
 * `*job-description*` class, then the div with the most text. Null when the
 * page has no text at all.
 */
export function extractJobDescription(html: string): string | null {
  const root = parse(html);

  const details =
    root.querySelector('[data-automation="jobAdDetails"]') ??
    root.querySelectorAll('div').find((div) =>
      (div.getAttribute('class') ?? '').toLowerCase().includes('job-description'),
    );
  if (details) return blockText(details) || null;

  let largest: HTMLElement | null = null;
  let largestLength = 0;
  for (const div of root.querySelectorAll('div')) {
    const length = div.text.trim().length;
    if (length > largestLength) {
      largest = div;
      largestLength = length;
    }
  }
  return largest ? blockText(largest) || null : null;
}
