/**
 * Profile Extractor Agent - resume text → CandidateProfile via the LLM
 *
 * Responsibilities:
 * - Truncate the resume at a sentence boundary within the character budget
 * - Ask the model for a structured block and read it leniently
 * - Re-prompt once with a strict instruction when the block is unusable
 * - Version the profile by hashing the full resume text
 *
 * LLM Usage: One call per resume (two when the first answer is malformed)
 */

import { z } from 'zod';
import {
  LlmUnavailableError,
  MalformedResponseError,
  SearchCancelledError,
  ValidationError,
  contentHash,
  errorMessage,
  truncateAtSentence,
  type MatchingConfig,
} from '@roleradar/core';
import {
  STRICT_RETRY_INSTRUCTION,
  buildPrompt,
  parseWithRetry,
  structuredExtractionSystem,
  type CompletionService,
} from '@roleradar/llm';
import { candidateProfileSchema, type CandidateProfile } from '@roleradar/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import { lenientNumber, stringList } from '../shared/coerce.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';

export const ProfileExtractorInputSchema = z.object({
  resumeText: z.string(),
});

export type ProfileExtractorInput = z.infer<typeof ProfileExtractorInputSchema>;

/** Shape the model is asked for. Every field is optional on the way in. */
export const ProfileResponseSchema = z.object({
  skills: stringList,
  experience_years: lenientNumber(0).transform((n) => Math.max(0, n)),
  education: stringList,
  certifications: stringList,
  previous_titles: stringList,
  industries: stringList,
  achievements: stringList,
  preferred_roles: stringList,
  location: z.preprocess(
    (v) => (typeof v === 'string' && v.trim() && v.trim().toLowerCase() !== 'unknown' ? v.trim() : null),
    z.string().nullable(),
  ),
});

export type ProfileResponse = z.infer<typeof ProfileResponseSchema>;

const PROFILE_PROMPT = `You are a professional resume parser. Extract key information from this resume.

RESUME TEXT:
{resume}

Extract:
1. Skills (technical and soft skills) - be comprehensive
2. Years of experience (estimate from the work history, as a number)
3. Education (degrees)
4. Certifications
5. Previous job titles
6. Industries worked in
7. Key achievements
8. Preferred role types (inferred from the experience pattern)
9. Location (if mentioned, otherwise "Unknown")

Return ONLY a JSON object with this structure:
{
  "skills": ["skill1", "skill2"],
  "experience_years": 5,
  "education": ["degree1"],
  "certifications": ["cert1"],
  "previous_titles": ["title1", "title2"],
  "industries": ["industry1"],
  "achievements": ["achievement1"],
  "preferred_roles": ["role1"],
  "location": "location or Unknown"
}`;

export interface ProfileExtractorDeps {
  completion: CompletionService;
  config: Pick<MatchingConfig, 'resumeMaxChars' | 'temperature'>;
}

export function toCandidateProfile(response: ProfileResponse, version: string): CandidateProfile {
  return {
    version,
    skills: response.skills,
    yearsExperience: response.experience_years,
    education: response.education,
    certifications: response.certifications,
    priorTitles: response.previous_titles,
    industries: response.industries,
    achievements: response.achievements,
    preferredRoles: response.preferred_roles,
    location: response.location,
  };
}

export class ProfileExtractorAgent extends BaseAgent<ProfileExtractorInput, CandidateProfile> {
  config: AgentConfig = {
    name: 'ProfileExtractorAgent',
    description: 'Extracts a structured candidate profile from plain resume text',
    version: '1.0.0',
  };

  inputSchema = ProfileExtractorInputSchema;
  outputSchema = candidateProfileSchema;

  constructor(private readonly deps: ProfileExtractorDeps) {
    super();
  }

  protected async run(input: ProfileExtractorInput, context: AgentContext): Promise<CandidateProfile> {
    return this.extract(input.resumeText, context.signal);
  }

  /**
   * @throws ValidationError for blank input, LlmUnavailableError when the
   * completion service fails, MalformedResponseError after the repair prompt
   */
  async extract(resumeText: string, signal?: AbortSignal): Promise<CandidateProfile> {
    if (!resumeText.trim()) throw new ValidationError('resumeText', 'resume text is empty');

    const { resumeMaxChars } = this.deps.config;
    const truncated = truncateAtSentence(resumeText, resumeMaxChars);
    if (truncated.length < resumeText.length) {
      this.warn(`Resume truncated from ${resumeText.length} to ${truncated.length} characters`);
    }

    const prompt = buildPrompt(PROFILE_PROMPT, { resume: truncated });

    this.info('Extracting profile via LLM');
    let parsed = parseWithRetry(await this.ask(prompt, signal), ProfileResponseSchema);
    if (!parsed.success) {
      this.warn(`Unusable profile response (${parsed.failure}), re-prompting`, { error: parsed.error });
      parsed = parseWithRetry(
        await this.ask(`${prompt}\n\n${STRICT_RETRY_INSTRUCTION}`, signal),
        ProfileResponseSchema,
      );
    }
    if (!parsed.success) {
      this.error('Profile response still unusable after re-prompt', {
        error: parsed.error,
        preview: parsed.rawResponse.slice(0, 200),
      });
      throw new MalformedResponseError('profile', parsed.error);
    }

    const profile = toCandidateProfile(parsed.data, contentHash(resumeText));
    this.info('Profile extracted', {
      skills: profile.skills.length,
      yearsExperience: profile.yearsExperience,
    });
    return profile;
  }

  private async ask(prompt: string, signal?: AbortSignal): Promise<string> {
    try {
      return await this.deps.completion.complete({
        prompt,
        system: structuredExtractionSystem('extract a candidate profile from a resume'),
        temperature: this.deps.config.temperature,
        json: true,
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw new SearchCancelledError();
      throw new LlmUnavailableError('profile', errorMessage(err));
    }
  }
}
