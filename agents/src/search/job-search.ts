/**
 * Job Search - one scraping session: its own Rate Controller, Fetch Executor
 * and transport. Nothing is shared between instances.
 */

import {
  RateController,
  ValidationError,
  buildSearchUrl,
  createLogger,
  type AppConfig,
  type Logger,
  type RandomSource,
  type Sleep,
} from '@roleradar/core';
import {
  searchCriteriaSchema,
  type JobRecord,
  type SearchCriteria,
  type SearchCriteriaInput,
} from '@roleradar/schemas';
import { FetchExecutor } from '../browser/fetch-executor.js';
import {
  extractJobDescription,
  extractListings,
  hasNextPage,
} from '../browser/listing-extractor.js';
import { PlaywrightTransport, type PageTransport } from '../browser/transport.js';

export interface JobSearchOptions {
  config: Pick<AppConfig, 'scraper' | 'evasion'>;
  /** Defaults to a headless Chromium transport. */
  transport?: PageTransport;
  random?: RandomSource;
  sleep?: Sleep;
  now?: () => number;
  signal?: AbortSignal;
  logger?: Logger;
}

export function parseCriteria(input: SearchCriteriaInput): SearchCriteria {
  const result = searchCriteriaSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(String(issue?.path[0] ?? 'criteria'), issue?.message ?? 'invalid');
  }
  return result.data;
}

export class JobSearch {
  readonly rateController: RateController;
  private readonly executor: FetchExecutor;
  private readonly transport: PageTransport;
  private readonly config: JobSearchOptions['config'];
  private readonly logger: Logger;
  private readonly details = new Map<string, JobRecord>();
  private closed = false;

  constructor(options: JobSearchOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createLogger('job-search');
    this.transport =
      options.transport ??
      new PlaywrightTransport({
        headless: options.config.scraper.headless,
        settleMs: options.config.scraper.settleMs,
      });
    this.rateController = new RateController(options.config.evasion, {
      random: options.random,
      sleep: options.sleep,
      now: options.now,
      signal: options.signal,
      logger: this.logger,
    });
    this.executor = new FetchExecutor(this.transport, this.rateController, options.config.scraper, {
      random: options.random,
      sleep: options.sleep,
      signal: options.signal,
      logger: this.logger,
    });
  }

  /**
   * Listings for the criteria, at most `maxJobs` (capped by `maxJobsLimit`).
   * Follows result pages only while more jobs are needed and a next page exists.
   * No detail pages are fetched here.
   */
  async search(input: SearchCriteriaInput): Promise<JobRecord[]> {
    this.ensureOpen();
    const criteria = parseCriteria(input);
    const { scraper } = this.config;
    const maxJobs = Math.min(criteria.maxJobs ?? scraper.defaultMaxJobs, scraper.maxJobsLimit);

    const jobs: JobRecord[] = [];
    const seen = new Set<string>();

    for (let page = 1; page <= scraper.maxListPages; page++) {
      const url = buildSearchUrl(criteria, scraper.baseUrl, page);
      this.logger.info(`Fetching results page ${page}`, { url });
      const html = await this.executor.fetch(url);
      const { records } = extractListings(html, { baseUrl: scraper.baseUrl });

      for (const record of records) {
        if (seen.has(record.id)) continue;
        seen.add(record.id);
        jobs.push(record);
        if (jobs.length >= maxJobs) break;
      }

      if (jobs.length >= maxJobs || records.length === 0 || !hasNextPage(html)) break;
    }

    this.logger.info(`Search found ${jobs.length} job(s)`, {
      title: criteria.title,
      location: criteria.location,
    });
    return jobs;
  }

  /** The job with its full description filled in. Fetched at most once per job. */
  async fetchDetail(job: JobRecord): Promise<JobRecord> {
    this.ensureOpen();
    if (job.fullDescription) return job;
    const cached = this.details.get(job.id);
    if (cached) return cached;

    const html = await this.executor.fetch(job.sourceUrl);
    const fullDescription = extractJobDescription(html);
    if (!fullDescription) this.logger.warn(`No description found for job ${job.id}`);
    const detailed: JobRecord = { ...job, fullDescription };
    this.details.set(job.id, detailed);
    return detailed;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.executor.dispose();
    await this.transport.close();
  }

  private ensureOpen(): void {
    if (this.closed) throw new Error('JobSearch is closed');
  }
}

/** Run `fn` with a fresh session and release it afterwards, whatever happens. */
export async function withJobSearch<T>(
  options: JobSearchOptions,
  fn: (search: JobSearch) => Promise<T>,
): Promise<T> {
  const search = new JobSearch(options);
  try {
    return await fn(search);
  } finally {
    await search.close();
  }
}
