import { describe, it, expect } from 'vitest';
import { JobSearch, withJobSearch } from '@roleradar/agents';
import { SearchCancelledError, ValidationError, seededRandom, type AppConfigInput } from '@roleradar/core';
import { FakeTransport, noSleep, routeMap, testConfig, type Router } from '../helpers/fakes';
import { cards, detailPage, resultsPage } from '../helpers/html';

const LIST_URL = 'https://www.seek.com.au/project-manager-jobs/in-sydney';

function open(router: Router, overrides: AppConfigInput = {}, signal?: AbortSignal) {
  const transport = new FakeTransport(router);
  const search = new JobSearch({
    config: testConfig(overrides),
    transport,
    random: seededRandom(21),
    sleep: noSleep,
    signal,
  });
  return { transport, search };
}

describe('JobSearch.search', () => {
  it('returns five listings from a single results request', async () => {
    const { transport, search } = open(
      routeMap({ [LIST_URL]: { status: 200, html: resultsPage(cards(8), { next: true }) } }),
    );

    const jobs = await search.search({ title: 'Project Manager', location: 'Sydney', maxJobs: 5 });

    expect(jobs.map((j) => j.id)).toEqual(['1001', '1002', '1003', '1004', '1005']);
    expect(jobs.every((j) => j.fullDescription === null)).toBe(true);
    expect(transport.calls.map((c) => c.url)).toEqual([LIST_URL]);
  });

  it('uses the default of five jobs', async () => {
    const { search } = open(routeMap({ [LIST_URL]: { status: 200, html: resultsPage(cards(8)) } }));

    const jobs = await search.search({ title: 'Project Manager', location: 'Sydney' });

    expect(jobs).toHaveLength(5);
  });

  it('follows the next page while more jobs are needed', async () => {
    const { transport, search } = open(
      routeMap({
        [LIST_URL]: { status: 200, html: resultsPage(cards(3, 1001), { next: true }) },
        [`${LIST_URL}?page=2`]: { status: 200, html: resultsPage(cards(3, 2001)) },
      }),
    );

    const jobs = await search.search({ title: 'Project Manager', location: 'Sydney', maxJobs: 5 });

    expect(jobs.map((j) => j.id)).toEqual(['1001', '1002', '1003', '2001', '2002']);
    expect(transport.calls).toHaveLength(2);
  });

  it('stops when there is no next page', async () => {
    const { transport, search } = open(routeMap({ [LIST_URL]: { status: 200, html: resultsPage(cards(2)) } }));

    const jobs = await search.search({ title: 'Project Manager', location: 'Sydney', maxJobs: 5 });

    expect(jobs).toHaveLength(2);
    expect(transport.calls).toHaveLength(1);
  });

  it('never reads more than maxListPages pages', async () => {
    const { transport, search } = open(
      (url) => {
        const page = Number(new URL(url).searchParams.get('page') ?? '1');
        return { status: 200, html: resultsPage(cards(1, page * 100), { next: true }) };
      },
      { scraper: { maxListPages: 2 } },
    );

    const jobs = await search.search({ title: 'Project Manager', location: 'Sydney', maxJobs: 10 });

    expect(jobs.map((j) => j.id)).toEqual(['100', '200']);
    expect(transport.calls).toHaveLength(2);
  });

  it('caps maxJobs at the configured limit', async () => {
    const { search } = open(routeMap({ [LIST_URL]: { status: 200, html: resultsPage(cards(8)) } }), {
      scraper: { maxJobsLimit: 3 },
    });

    const jobs = await search.search({ title: 'Project Manager', location: 'Sydney', maxJobs: 10 });

    expect(jobs).toHaveLength(3);
  });

  it('returns an empty list when nothing matches', async () => {
    const { search } = open(routeMap({ [LIST_URL]: { status: 200, html: resultsPage([]) } }));

    await expect(search.search({ title: 'Project Manager', location: 'Sydney' })).resolves.toEqual([]);
  });

  it('rejects unusable criteria before any request', async () => {
    const { transport, search } = open(routeMap({}));

    await expect(search.search({ title: '   ', location: 'Sydney' })).rejects.toBeInstanceOf(ValidationError);
    await expect(search.search({ title: '???', location: 'Sydney' })).rejects.toBeInstanceOf(ValidationError);
    await expect(search.search({ title: 'Nurse', location: 'Perth', maxJobs: 0 })).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(transport.calls).toHaveLength(0);
  });

  it('honours cancellation before the first request', async () => {
    const abort = new AbortController();
    abort.abort();
    const { transport, search } = open(routeMap({}), {}, abort.signal);

    await expect(search.search({ title: 'Project Manager', location: 'Sydney' })).rejects.toBeInstanceOf(
      SearchCancelledError,
    );
    expect(transport.calls).toHaveLength(0);
  });
});

describe('JobSearch.fetchDetail', () => {
  it('fetches the description once per job', async () => {
    const { transport, search } = open(
      routeMap({
        [LIST_URL]: { status: 200, html: resultsPage(cards(1)) },
        'https://www.seek.com.au/job/1001?type=standard': {
          status: 200,
          html: detailPage('Deliver the Parramatta fit-out on time.'),
        },
      }),
    );
    const [job] = await search.search({ title: 'Project Manager', location: 'Sydney' });

    const detailed = await search.fetchDetail(job);
    const again = await search.fetchDetail(job);

    expect(detailed.fullDescription).toBe('Deliver the Parramatta fit-out on time.');
    expect(detailed.shortDescription).toBe(job.shortDescription);
    expect(job.fullDescription).toBeNull();
    expect(again).toBe(detailed);
    expect(transport.calls).toHaveLength(2);
  });

  it('skips jobs that already carry a description', async () => {
    const { transport, search } = open(routeMap({}));
    const job = {
      id: '1',
      title: 'Analyst',
      company: 'Acme',
      location: 'Sydney',
      salary: null,
      workType: null,
      postedAt: null,
      shortDescription: null,
      fullDescription: 'Already here.',
      sourceUrl: 'https://www.seek.com.au/job/1',
    };

    await expect(search.fetchDetail(job)).resolves.toBe(job);
    expect(transport.calls).toHaveLength(0);
  });
});

describe('withJobSearch', () => {
  it('closes the session when the callback throws', async () => {
    const transport = new FakeTransport(routeMap({}));

    await expect(
      withJobSearch({ config: testConfig(), transport, sleep: noSleep }, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(transport.closed).toBe(true);
  });

  it('returns the callback result and closes', async () => {
    const transport = new FakeTransport(routeMap({ [LIST_URL]: { status: 200, html: resultsPage(cards(2)) } }));

    const count = await withJobSearch({ config: testConfig(), transport, sleep: noSleep }, async (search) =>
      (await search.search({ title: 'Project Manager', location: 'Sydney' })).length,
    );

    expect(count).toBe(2);
    expect(transport.closed).toBe(true);
  });
});
