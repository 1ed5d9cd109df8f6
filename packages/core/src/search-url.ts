import type { SearchCriteria } from '@roleradar/schemas';
import { ValidationError } from './errors';

/** Lower-case, hyphenated path segment; anything but letters, digits, spaces and hyphens is dropped. */
export function sanitizeSlug(value: string, field: string): string {
  const slug = value
    .replace(/[^\p{L}\p{M}\p{N}\s_-]/gu, '')
    .trim()
    .toLowerCase()
    .replace(/[\s_-]+/gu, '-')
    .replace(/^-+|-+$/g, '');
  if (!slug) throw new ValidationError(field, 'must contain letters or digits');
  return slug;
}

const WORK_TYPE_PARAMS: Record<NonNullable<SearchCriteria['workType']>, [string, string]> = {
  'full-time': ['fullTime', 'true'],
  'part-time': ['partTime', 'true'],
  'contract-temp': ['contract', 'true'],
  'casual-vacation': ['casual', 'true'],
};

const REMOTE_PARAMS: Record<NonNullable<SearchCriteria['remoteOption']>, string> = {
  remote: 'work-from-home',
  hybrid: 'hybrid',
  'on-site': 'office',
};

const DATE_RANGE: Record<NonNullable<SearchCriteria['datePosted']>, string> = {
  today: '1',
  '3': '3',
  '7': '7',
  '14': '14',
  '30': '30',
};

type UrlCriteria = Pick<
  SearchCriteria,
  'title' | 'location' | 'workType' | 'remoteOption' | 'minSalary' | 'datePosted'
>;

/** `{base}/{title}-jobs/in-{location}` plus filter and page parameters. */
export function buildSearchUrl(criteria: UrlCriteria, baseUrl: string, page = 1): string {
  const title = sanitizeSlug(criteria.title, 'title');
  const location = sanitizeSlug(criteria.location, 'location');

  const params = new URLSearchParams();
  if (criteria.workType) {
    const [key, value] = WORK_TYPE_PARAMS[criteria.workType];
    params.set(key, value);
  }
  if (criteria.remoteOption) params.set('worktype', REMOTE_PARAMS[criteria.remoteOption]);
  if (criteria.minSalary !== undefined) {
    params.set('salarytype', 'annual');
    params.set('salaryrange', `${criteria.minSalary}-`);
  }
  if (criteria.datePosted) params.set('daterange', DATE_RANGE[criteria.datePosted]);
  if (page > 1) params.set('page', String(page));

  const base = baseUrl.replace(/\/+$/, '');
  const query = params.toString();
  return `${base}/${title}-jobs/in-${location}${query ? `?${query}` : ''}`;
}
