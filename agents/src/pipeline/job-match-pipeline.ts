/**
 * Job match pipeline: search → detail pages → profile → scores → ranking.
 *
 * Extraction failures degrade the result instead of failing it: a bad profile
 * answer leaves every job unscored, a bad score answer leaves one job unscored.
 * Search failures and cancellation still propagate.
 */

import {
  FetchFailedError,
  createLogger,
  isExtractionError,
  type AppConfig,
  type Logger,
  type PipelineStage,
  type RandomSource,
  type Sleep,
} from '@roleradar/core';
import type { CompletionService } from '@roleradar/llm';
import type { CandidateProfile, JobRecord, SearchCriteriaInput } from '@roleradar/schemas';
import type { PageTransport } from '../browser/transport.js';
import { MatchScorerAgent } from '../match/match-scorer-agent.js';
import { ProfileExtractorAgent } from '../profile/profile-extractor-agent.js';
import { withJobSearch } from '../search/job-search.js';

export interface PipelineIssue {
  stage: PipelineStage;
  jobId?: string;
  message: string;
}

export interface JobMatchOptions {
  criteria: SearchCriteriaInput;
  /** Plain resume text. Without it the listings come back unscored. */
  resumeText?: string;
  config: AppConfig;
  completion: CompletionService;
  /** How many of the found jobs get their detail page fetched. */
  detailLimit?: number;
  transport?: PageTransport;
  random?: RandomSource;
  sleep?: Sleep;
  now?: () => number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface JobMatchResult {
  jobs: JobRecord[];
  profile: CandidateProfile | null;
  issues: PipelineIssue[];
}

/** Scored jobs by descending score, then unscored ones; ties keep search order. */
export function rankJobs(jobs: readonly JobRecord[]): JobRecord[] {
  const scored = jobs.filter((job) => job.match !== undefined);
  const unscored = jobs.filter((job) => job.match === undefined);
  scored.sort((a, b) => (b.match?.overallScore ?? 0) - (a.match?.overallScore ?? 0));
  return [...scored, ...unscored];
}

export async function runJobMatch(options: JobMatchOptions): Promise<JobMatchResult> {
  const logger = options.logger ?? createLogger('job-match');
  const issues: PipelineIssue[] = [];
  const detailLimit = options.detailLimit ?? 0;

  let jobs = await withJobSearch(
    {
      config: options.config,
      transport: options.transport,
      random: options.random,
      sleep: options.sleep,
      now: options.now,
      signal: options.signal,
      logger,
    },
    async (search) => {
      const found = await search.search(options.criteria);
      const withDetails: JobRecord[] = [];
      for (const [index, job] of found.entries()) {
        if (index >= detailLimit) {
          withDetails.push(job);
          continue;
        }
        try {
          withDetails.push(await search.fetchDetail(job));
        } catch (err) {
          if (!(err instanceof FetchFailedError)) throw err;
          issues.push({ stage: err.stage, jobId: job.id, message: err.userMessage });
          withDetails.push(job);
        }
      }
      return withDetails;
    },
  );

  if (!options.resumeText?.trim() || jobs.length === 0) {
    return { jobs, profile: null, issues };
  }

  const extractor = new ProfileExtractorAgent({
    completion: options.completion,
    config: options.config.matching,
  });
  let profile: CandidateProfile;
  try {
    profile = await extractor.extract(options.resumeText, options.signal);
  } catch (err) {
    if (!isExtractionError(err)) throw err;
    logger.warn(`Profile extraction failed; returning unscored listings`, { error: err.message });
    issues.push({ stage: err.stage, message: err.userMessage });
    return { jobs, profile: null, issues };
  }

  const scorer = new MatchScorerAgent({
    completion: options.completion,
    config: options.config.matching,
  });
  const scoredJobs: JobRecord[] = [];
  for (const job of jobs) {
    try {
      const match = await scorer.score(profile, job, options.signal);
      scoredJobs.push({ ...job, match });
    } catch (err) {
      if (!isExtractionError(err)) throw err;
      issues.push({ stage: err.stage, jobId: job.id, message: err.userMessage });
      scoredJobs.push(job);
    }
  }
  jobs = rankJobs(scoredJobs);

  logger.info(`Matched ${jobs.filter((j) => j.match).length}/${jobs.length} job(s)`, {
    issues: issues.length,
  });
  return { jobs, profile, issues };
}
