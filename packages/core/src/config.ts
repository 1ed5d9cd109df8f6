/**
 * Runtime configuration. Every knob has a default; `loadConfig` overlays
 * environment variables (SCRAPER_*, EVASION_*, MATCH_*).
 */

import { z } from 'zod';

const rangeSchema = (min: number, max: number) =>
  z
    .object({ min: z.number().min(0), max: z.number().min(0) })
    .refine((r) => r.min <= r.max, { message: 'min must not exceed max' })
    .default({ min, max });

export const ScraperConfigSchema = z.object({
  baseUrl: z.string().url().default('https://www.seek.com.au'),
  defaultMaxJobs: z.number().int().min(1).default(5),
  maxJobsLimit: z.number().int().min(1).default(50),
  maxListPages: z.number().int().min(1).default(3),
  pageLoadTimeoutMs: z.number().int().positive().default(30000),
  /** Extra wait after navigation so client-rendered cards settle. */
  settleMs: z.number().int().min(0).default(2000),
  maxRetries: z.number().int().min(0).default(3),
  retryBaseDelayMs: z.number().min(0).default(2000),
  retryMaxDelayMs: z.number().min(0).default(60000),
  headless: z.boolean().default(true),
});

export type ScraperConfig = z.infer<typeof ScraperConfigSchema>;

export const EvasionConfigSchema = z
  .object({
    minDelayMs: z.number().min(0).default(2000),
    maxDelayMs: z.number().min(0).default(5000),
    jitter: z.boolean().default(true),
    /** Jitter is drawn from [0, base * jitterRatio]. */
    jitterRatio: z.number().min(0).max(1).default(0.3),
    humanLike: z.boolean().default(true),
    longPauseEvery: rangeSchema(5, 10),
    longPauseMs: rangeSchema(5000, 15000),
    extendedPauseChance: z.number().min(0).max(1).default(0.05),
    extendedPauseMs: rangeSchema(30000, 60000),
    sessionLifetime: z.number().int().min(1).default(10),
    sessionMaxAgeMs: z.number().int().positive().default(30 * 60 * 1000),
    /** Multiplier applied to the delay that follows a 429. */
    rateLimitPenalty: z.number().min(1).default(2),
  })
  .refine((c) => c.minDelayMs <= c.maxDelayMs, {
    message: 'minDelayMs must not exceed maxDelayMs',
  });

export type EvasionConfig = z.infer<typeof EvasionConfigSchema>;

export const TierThresholdsSchema = z
  .object({
    strong: z.number().min(0).max(100).default(85),
    good: z.number().min(0).max(100).default(70),
    moderate: z.number().min(0).max(100).default(50),
  })
  .refine((t) => t.strong >= t.good && t.good >= t.moderate, {
    message: 'Tier thresholds must be descending',
  });

export type TierThresholds = z.infer<typeof TierThresholdsSchema>;

export const MatchingConfigSchema = z.object({
  resumeMaxChars: z.number().int().positive().default(5000),
  jobDescriptionMaxChars: z.number().int().positive().default(2000),
  maxSkillsToShow: z.number().int().positive().default(15),
  maxTitlesToShow: z.number().int().positive().default(5),
  maxIndustriesToShow: z.number().int().positive().default(3),
  maxEducationToShow: z.number().int().positive().default(2),
  temperature: z.number().min(0).max(2).default(0.3),
  tierThresholds: TierThresholdsSchema.default({}),
});

export type MatchingConfig = z.infer<typeof MatchingConfigSchema>;

export const AppConfigSchema = z.object({
  scraper: ScraperConfigSchema.default({}),
  evasion: EvasionConfigSchema.default({}),
  matching: MatchingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

type Env = Record<string, string | undefined>;

function num(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  if (Number.isNaN(n)) throw new Error(`Environment variable ${key} must be a number, got "${raw}"`);
  return n;
}

function bool(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return undefined;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function str(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

/** Build the app config from defaults, optional overrides and the environment (env wins). */
export function loadConfig(env: Env = process.env, overrides: AppConfigInput = {}): AppConfig {
  const defined = (o: Record<string, unknown>): Record<string, unknown> =>
    Object.fromEntries(Object.entries(o).filter(([, v]) => v !== undefined));

  return AppConfigSchema.parse({
    scraper: {
      ...overrides.scraper,
      ...defined({
        baseUrl: str(env, 'SCRAPER_BASE_URL'),
        defaultMaxJobs: num(env, 'SCRAPER_DEFAULT_MAX_JOBS'),
        maxJobsLimit: num(env, 'SCRAPER_MAX_JOBS_LIMIT'),
        maxListPages: num(env, 'SCRAPER_MAX_LIST_PAGES'),
        pageLoadTimeoutMs: num(env, 'SCRAPER_PAGE_LOAD_TIMEOUT_MS'),
        settleMs: num(env, 'SCRAPER_SETTLE_MS'),
        maxRetries: num(env, 'SCRAPER_MAX_RETRIES'),
        retryBaseDelayMs: num(env, 'SCRAPER_RETRY_BASE_DELAY_MS'),
        retryMaxDelayMs: num(env, 'SCRAPER_RETRY_MAX_DELAY_MS'),
        headless: bool(env, 'SCRAPER_HEADLESS'),
      }),
    },
    evasion: {
      ...overrides.evasion,
      ...defined({
        minDelayMs: num(env, 'EVASION_MIN_DELAY_MS'),
        maxDelayMs: num(env, 'EVASION_MAX_DELAY_MS'),
        jitter: bool(env, 'EVASION_JITTER'),
        jitterRatio: num(env, 'EVASION_JITTER_RATIO'),
        humanLike: bool(env, 'EVASION_HUMAN_LIKE'),
        extendedPauseChance: num(env, 'EVASION_EXTENDED_PAUSE_CHANCE'),
        sessionLifetime: num(env, 'EVASION_SESSION_LIFETIME'),
        sessionMaxAgeMs: num(env, 'EVASION_SESSION_MAX_AGE_MS'),
        rateLimitPenalty: num(env, 'EVASION_RATE_LIMIT_PENALTY'),
      }),
    },
    matching: {
      ...overrides.matching,
      ...defined({
        resumeMaxChars: num(env, 'MATCH_RESUME_MAX_CHARS'),
        jobDescriptionMaxChars: num(env, 'MATCH_JOB_DESCRIPTION_MAX_CHARS'),
        temperature: num(env, 'MATCH_TEMPERATURE'),
      }),
      tierThresholds: {
        ...overrides.matching?.tierThresholds,
        ...defined({
          strong: num(env, 'MATCH_TIER_STRONG'),
          good: num(env, 'MATCH_TIER_GOOD'),
          moderate: num(env, 'MATCH_TIER_MODERATE'),
        }),
      },
    },
  });
}
