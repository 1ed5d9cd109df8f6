import { describe, it, expect } from 'vitest';
import { extractJobDescription, extractListings, hasNextPage, jobIdFromUrl } from '@roleradar/agents';
import { cards, jobCard, resultsPage } from '../helpers/html';

const BASE = 'https://www.seek.com.au';

describe('extractListings', () => {
  it('maps every card field', () => {
    const html = resultsPage([
      jobCard({
        id: '81234567',
        title: 'Senior  Project Manager',
        company: 'Harbour Build Co',
        location: 'Sydney NSW',
        salary: '$150k - $170k',
        workType: 'Full time',
        listed: '2d ago',
        teaser: 'Lead delivery of commercial fit-outs.',
      }),
    ]);

    const { records, skipped } = extractListings(html, { baseUrl: BASE });

    expect(skipped).toEqual([]);
    expect(records).toEqual([
      {
        id: '81234567',
        title: 'Senior Project Manager',
        company: 'Harbour Build Co',
        location: 'Sydney NSW',
        salary: '$150k - $170k',
        workType: 'Full time',
        postedAt: '2d ago',
        shortDescription: 'Lead delivery of commercial fit-outs.',
        fullDescription: null,
        sourceUrl: 'https://www.seek.com.au/job/81234567?type=standard',
      },
    ]);
  });

  it('skips a card without a title and keeps the rest', () => {
    const html = resultsPage([...cards(10), jobCard({ id: '9999', company: 'No Title Ltd' })]);

    const { records, skipped } = extractListings(html, { baseUrl: BASE });

    expect(records).toHaveLength(10);
    expect(skipped).toEqual([{ index: 10, reason: 'missing title' }]);
  });

  it('fills missing optional fields with null', () => {
    const html = resultsPage([jobCard({ id: '42', title: 'Analyst' })]);

    const [record] = extractListings(html, { baseUrl: BASE }).records;

    expect(record.company).toBe('Unknown');
    expect(record.location).toBe('Unknown');
    expect(record.salary).toBeNull();
    expect(record.postedAt).toBeNull();
    expect(record.shortDescription).toBeNull();
  });

  it('drops duplicate job ids', () => {
    const html = resultsPage([
      jobCard({ id: '7', title: 'First copy' }),
      jobCard({ id: '7', title: 'Second copy' }),
    ]);

    const { records } = extractListings(html, { baseUrl: BASE });

    expect(records.map((r) => r.title)).toEqual(['First copy']);
  });

  it('falls back to job articles without the card marker', () => {
    const html = '<html><body><article><h2><a href="/job/555">Warehouse job</a></h2></article></body></html>';

    const { records } = extractListings(html, { baseUrl: BASE });

    expect(records.map((r) => [r.id, r.title, r.sourceUrl])).toEqual([
      ['555', 'Warehouse job', 'https://www.seek.com.au/job/555'],
    ]);
  });

  it('returns nothing for a page without cards', () => {
    expect(extractListings('<html><body><p>No matching jobs</p></body></html>', { baseUrl: BASE })).toEqual({
      records: [],
      skipped: [],
    });
  });
});

describe('jobIdFromUrl', () => {
  it('uses the numeric job id when present', () => {
    expect(jobIdFromUrl('https://www.seek.com.au/job/81234567?ref=search')).toBe('81234567');
  });

  it('hashes other URLs ignoring query, fragment and trailing slash', () => {
    const id = jobIdFromUrl('https://careers.example.test/roles/abc/');
    expect(id).toMatch(/^[0-9a-f]{16}$/);
    expect(jobIdFromUrl('https://careers.example.test/roles/abc?src=feed#apply')).toBe(id);
  });
});

describe('hasNextPage', () => {
  it('recognises the supported next-page links', () => {
    expect(hasNextPage(resultsPage([], { next: true }))).toBe(true);
    expect(hasNextPage('<a rel="next" href="?page=3">3</a>')).toBe(true);
    expect(hasNextPage('<a aria-label="Next page" href="?page=2">›</a>')).toBe(true);
    expect(hasNextPage(resultsPage([]))).toBe(false);
  });
});

describe('extractJobDescription', () => {
  it('reads the job ad details block line by line', () => {
    const html = `<html><body>
      <div class="nav">Menu</div>
      <div data-automation="jobAdDetails">
        <p>About the role</p>
        <ul><li>Lead projects</li><li>Report   weekly</li></ul>
      </div>
    </body></html>`;

    expect(extractJobDescription(html)?.split('\n')).toEqual([
      'About the role',
      'Lead projects',
      'Report weekly',
    ]);
  });

  it('falls back to a job-description class', () => {
    const html = '<div class="Styled-job-description_x1"><p>Build things.</p></div>';
    expect(extractJobDescription(html)).toBe('Build things.');
  });

  it('falls back to the div with the most text', () => {
    const html = '<body><section><div>short</div></section><div><p>This is the longest block of text here</p></div></body>';
    expect(extractJobDescription(html)).toBe('This is the longest block of text here');
  });

  it('returns null for an empty page', () => {
    expect(extractJobDescription('<html><body></body></html>')).toBeNull();
  });
});
