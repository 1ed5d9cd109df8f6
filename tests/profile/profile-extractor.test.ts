import { describe, it, expect } from 'vitest';
import { ProfileExtractorAgent } from '@roleradar/agents';
import {
  LlmUnavailableError,
  MalformedResponseError,
  ValidationError,
  contentHash,
} from '@roleradar/core';
import { STRICT_RETRY_INSTRUCTION } from '@roleradar/llm';
import { FakeCompletion } from '../helpers/fakes';

const RESUME = 'Senior engineer with ten years. Led teams of five. Built data platforms.';

const GOOD_ANSWER = `Sure! Here is the profile:
\`\`\`json
{
  "skills": ["Python", "python", "SQL", "  Team   leadership "],
  "experience_years": "10+",
  "education": "BSc Computer Science",
  "previous_titles": ["Senior Engineer", "Engineer"],
  "industries": ["Finance"],
  "achievements": ["Built data platforms"],
  "preferred_roles": ["Engineering Manager"],
  "location": "Unknown"
}
\`\`\``;

const config = { resumeMaxChars: 5000, temperature: 0.3 };

describe('ProfileExtractorAgent', () => {
  it('reads a fenced answer leniently', async () => {
    const completion = new FakeCompletion([GOOD_ANSWER]);
    const agent = new ProfileExtractorAgent({ completion, config });

    const profile = await agent.extract(RESUME);

    expect(profile).toEqual({
      version: contentHash(RESUME),
      skills: ['Python', 'SQL', 'Team leadership'],
      yearsExperience: 10,
      education: ['BSc Computer Science'],
      certifications: [],
      priorTitles: ['Senior Engineer', 'Engineer'],
      industries: ['Finance'],
      achievements: ['Built data platforms'],
      preferredRoles: ['Engineering Manager'],
      location: null,
    });
    expect(completion.requests).toHaveLength(1);
    expect(completion.requests[0].json).toBe(true);
    expect(completion.requests[0].temperature).toBe(0.3);
  });

  it('defaults every missing field', async () => {
    const agent = new ProfileExtractorAgent({ completion: new FakeCompletion(['{}']), config });

    const profile = await agent.extract(RESUME);

    expect(profile.skills).toEqual([]);
    expect(profile.yearsExperience).toBe(0);
    expect(profile.location).toBeNull();
  });

  it('truncates the resume at a sentence boundary but versions the full text', async () => {
    const completion = new FakeCompletion([GOOD_ANSWER]);
    const agent = new ProfileExtractorAgent({ completion, config: { resumeMaxChars: 40, temperature: 0.3 } });

    const profile = await agent.extract(RESUME);

    expect(completion.requests[0].prompt).toContain('Senior engineer with ten years.');
    expect(completion.requests[0].prompt).not.toContain('Led teams');
    expect(profile.version).toBe(contentHash(RESUME));
  });

  it('re-prompts once with the strict instruction', async () => {
    const completion = new FakeCompletion(['I think they are a great engineer!', GOOD_ANSWER]);
    const agent = new ProfileExtractorAgent({ completion, config });

    const profile = await agent.extract(RESUME);

    expect(profile.skills).toContain('SQL');
    expect(completion.requests).toHaveLength(2);
    expect(completion.requests[0].prompt).not.toContain(STRICT_RETRY_INSTRUCTION);
    expect(completion.requests[1].prompt).toContain(STRICT_RETRY_INSTRUCTION);
  });

  it('gives up after the second malformed answer', async () => {
    const completion = new FakeCompletion(['not json', '["a list", "not an object"]']);
    const agent = new ProfileExtractorAgent({ completion, config });

    const error = await agent.extract(RESUME).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MalformedResponseError);
    expect(error instanceof MalformedResponseError && error.stage).toBe('profile');
    expect(completion.requests).toHaveLength(2);
  });

  it('reports an unavailable model without re-prompting', async () => {
    const completion = new FakeCompletion([new Error('connect ECONNREFUSED 127.0.0.1:11434')]);
    const agent = new ProfileExtractorAgent({ completion, config });

    const error = await agent.extract(RESUME).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LlmUnavailableError);
    expect(error instanceof LlmUnavailableError && error.message).toBe(
      'Language model unavailable: connect ECONNREFUSED 127.0.0.1:11434',
    );
    expect(completion.requests).toHaveLength(1);
  });

  it('rejects blank resume text before calling the model', async () => {
    const completion = new FakeCompletion([GOOD_ANSWER]);
    const agent = new ProfileExtractorAgent({ completion, config });

    await expect(agent.extract('  \n ')).rejects.toBeInstanceOf(ValidationError);
    expect(completion.requests).toHaveLength(0);
  });

  it('returns failures from execute instead of throwing', async () => {
    const agent = new ProfileExtractorAgent({ completion: new FakeCompletion(['nope', 'still nope']), config });

    const result = await agent.execute({ resumeText: RESUME });

    expect(result.success).toBe(false);
    expect(result.success ? null : result.cause).toBeInstanceOf(MalformedResponseError);
    expect(agent.getLogs().some((log) => log.level === 'error')).toBe(true);
  });

  it('returns the validated profile from execute', async () => {
    const agent = new ProfileExtractorAgent({ completion: new FakeCompletion([GOOD_ANSWER]), config });

    const result = await agent.execute({ resumeText: RESUME });

    expect(result.success && result.data.priorTitles).toEqual(['Senior Engineer', 'Engineer']);
  });
});
