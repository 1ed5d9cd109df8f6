/**
 * Match Scorer Agent - scores one job against one candidate profile
 *
 * Responsibilities:
 * - Serve repeated (job, profile version) pairs from the cache
 * - Summarise the profile and the truncated job description into one prompt
 * - Clamp model scores to 0-100 and derive the tier from our thresholds
 *
 * LLM Usage: One call per uncached job (two when the first answer is malformed)
 */

import { z } from 'zod';
import {
  LlmUnavailableError,
  MalformedResponseError,
  SearchCancelledError,
  errorMessage,
  truncateAtSentence,
  type MatchingConfig,
} from '@roleradar/core';
import {
  STRICT_RETRY_INSTRUCTION,
  buildPrompt,
  parseWithRetry,
  type CompletionService,
} from '@roleradar/llm';
import {
  candidateProfileSchema,
  jobRecordSchema,
  matchResultSchema,
  type CandidateProfile,
  type JobRecord,
  type MatchResult,
} from '@roleradar/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import { clamp, lenientNumber, lenientText, requiredNumber, stringList } from '../shared/coerce.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';
import { MatchCache } from './match-cache.js';
import { tierForScore } from './recommendation.js';

export const MatchScorerInputSchema = z.object({
  profile: candidateProfileSchema,
  job: jobRecordSchema,
});

export type MatchScorerInput = z.infer<typeof MatchScorerInputSchema>;

/** `score` is the only field the answer cannot do without. */
export const MatchResponseSchema = z.object({
  score: requiredNumber,
  skill_match_percentage: lenientNumber(0),
  reasoning: lenientText,
  pros: stringList,
  cons: stringList,
  gaps: stringList,
  strong_matches: stringList,
  strategic_considerations: stringList,
});

export type MatchResponse = z.infer<typeof MatchResponseSchema>;

const MATCH_PROMPT = `You are an expert career advisor and recruiter. Score how well this job matches the candidate's profile.

CANDIDATE PROFILE:
Skills: {skills}
Experience: {years} years
Previous Roles: {titles}
Industries: {industries}
Education: {education}

JOB DETAILS:
Title: {title}
Company: {company}
Location: {location}
Salary: {salary}
Description: {description}

Consider skill alignment, experience level, industry relevance, career progression and role responsibilities.

Return ONLY a JSON object:
{
  "score": 75,
  "reasoning": "2-3 sentence explanation of the score",
  "pros": ["specific pro"],
  "cons": ["specific con"],
  "skill_match_percentage": 70,
  "strong_matches": ["specific match"],
  "gaps": ["specific gap"],
  "strategic_considerations": ["consideration"]
}

score and skill_match_percentage are integers from 0 to 100.`;

export interface MatchScorerDeps {
  completion: CompletionService;
  config: Pick<
    MatchingConfig,
    | 'jobDescriptionMaxChars'
    | 'maxSkillsToShow'
    | 'maxTitlesToShow'
    | 'maxIndustriesToShow'
    | 'maxEducationToShow'
    | 'temperature'
    | 'tierThresholds'
  >;
  cache?: MatchCache;
}

function listOrDash(items: string[], max: number): string {
  return items.slice(0, max).join(', ') || 'Not specified';
}

export class MatchScorerAgent extends BaseAgent<MatchScorerInput, MatchResult> {
  config: AgentConfig = {
    name: 'MatchScorerAgent',
    description: 'Scores how well a job posting fits a candidate profile',
    version: '1.0.0',
  };

  inputSchema = MatchScorerInputSchema;
  outputSchema = matchResultSchema;

  readonly cache: MatchCache;

  constructor(private readonly deps: MatchScorerDeps) {
    super();
    this.cache = deps.cache ?? new MatchCache();
  }

  protected async run(input: MatchScorerInput, context: AgentContext): Promise<MatchResult> {
    return this.score(input.profile, input.job, context.signal);
  }

  promptFor(profile: CandidateProfile, job: JobRecord): string {
    const { config } = this.deps;
    const description = truncateAtSentence(
      job.fullDescription ?? job.shortDescription ?? '',
      config.jobDescriptionMaxChars,
    );
    return buildPrompt(MATCH_PROMPT, {
      skills: listOrDash(profile.skills, config.maxSkillsToShow),
      years: String(profile.yearsExperience),
      titles: listOrDash(profile.priorTitles, config.maxTitlesToShow),
      industries: listOrDash(profile.industries, config.maxIndustriesToShow),
      education: listOrDash(profile.education, config.maxEducationToShow),
      title: job.title,
      company: job.company,
      location: job.location,
      salary: job.salary ?? 'Not specified',
      description: description || 'Not provided',
    });
  }

  /**
   * @throws LlmUnavailableError when the completion service fails,
   * MalformedResponseError after the repair prompt
   */
  async score(profile: CandidateProfile, job: JobRecord, signal?: AbortSignal): Promise<MatchResult> {
    const cached = this.cache.get(job.id, profile.version);
    if (cached) {
      this.debug(`Cache hit for job ${job.id}`);
      return cached;
    }

    const prompt = this.promptFor(profile, job);
    this.info(`Scoring job ${job.id}`, { title: job.title });

    let parsed = parseWithRetry(await this.ask(prompt, job.id, signal), MatchResponseSchema);
    if (!parsed.success) {
      this.warn(`Unusable match response for job ${job.id} (${parsed.failure}), re-prompting`, {
        error: parsed.error,
      });
      parsed = parseWithRetry(
        await this.ask(`${prompt}\n\n${STRICT_RETRY_INSTRUCTION}`, job.id, signal),
        MatchResponseSchema,
      );
    }
    if (!parsed.success) {
      this.error(`Match response for job ${job.id} still unusable`, { error: parsed.error });
      throw new MalformedResponseError('score', parsed.error, job.id);
    }

    const result = this.toMatchResult(parsed.data, profile, job);
    this.cache.set(result);
    this.info(`Scored job ${job.id}: ${result.overallScore} (${result.recommendation})`);
    return result;
  }

  private toMatchResult(
    response: MatchResponse,
    profile: CandidateProfile,
    job: JobRecord,
  ): MatchResult {
    const overallScore = clamp(response.score, 0, 100);
    return {
      jobId: job.id,
      profileVersion: profile.version,
      overallScore,
      skillMatchPercentage: clamp(response.skill_match_percentage, 0, 100),
      recommendation: tierForScore(overallScore, this.deps.config.tierThresholds),
      reasoning: response.reasoning,
      pros: response.pros,
      cons: response.cons,
      gaps: response.gaps,
      strongMatches: response.strong_matches,
      strategicNotes: response.strategic_considerations,
    };
  }

  private async ask(prompt: string, jobId: string, signal?: AbortSignal): Promise<string> {
    try {
      return await this.deps.completion.complete({
        prompt,
        temperature: this.deps.config.temperature,
        json: true,
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw new SearchCancelledError();
      throw new LlmUnavailableError('score', errorMessage(err), jobId);
    }
  }
}
