/**
 * Typed failures surfaced by the fetch engine and the extraction pipeline.
 *
 * Every error carries the stage it came from and a `userMessage` that is safe
 * to show: it names the job or URL involved but never the request identity.
 */

export type PipelineStage = 'input' | 'fetch' | 'extract' | 'profile' | 'score' | 'search';

export abstract class PipelineError extends Error {
  abstract readonly stage: PipelineStage;
  readonly context: Readonly<Record<string, string | number>>;

  constructor(message: string, context: Record<string, string | number> = {}) {
    super(message);
    this.name = new.target.name;
    this.context = Object.freeze({ ...context });
  }

  get userMessage(): string {
    return this.message;
  }
}

/** Bad user-supplied search input. */
export class ValidationError extends PipelineError {
  readonly stage = 'input' as const;

  constructor(
    readonly field: string,
    reason: string,
  ) {
    super(`Invalid ${field}: ${reason}`, { field });
  }
}

/** A page could not be retrieved: retries exhausted or a non-transient HTTP failure. */
export class FetchFailedError extends PipelineError {
  readonly stage = 'fetch' as const;

  constructor(
    readonly url: string,
    readonly attempts: number,
    readonly reason: string,
    readonly status?: number,
  ) {
    super(
      `Failed to fetch ${url} after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${reason}`,
      status === undefined ? { url, attempts } : { url, attempts, status },
    );
  }
}

/** The source kept answering 429; callers should back off for the whole session. */
export class RateLimitedError extends FetchFailedError {
  constructor(url: string, attempts: number) {
    super(url, attempts, 'rate limited by the source (HTTP 429)', 429);
  }
}

/** The model answered, but no usable structured block could be read even after one repair prompt. */
export class MalformedResponseError extends PipelineError {
  constructor(
    readonly stage: 'profile' | 'score',
    readonly detail: string,
    readonly jobId?: string,
  ) {
    super(
      stage === 'profile'
        ? `Could not read the resume analysis from the model: ${detail}`
        : `Could not read the match analysis for job ${jobId ?? 'unknown'}: ${detail}`,
      jobId ? { jobId } : {},
    );
  }
}

/** The completion service itself failed (network, HTTP error, timeout). */
export class LlmUnavailableError extends PipelineError {
  constructor(
    readonly stage: 'profile' | 'score',
    reason: string,
    readonly jobId?: string,
  ) {
    super(`Language model unavailable: ${reason}`, jobId ? { jobId } : {});
  }
}

export class SearchCancelledError extends PipelineError {
  readonly stage = 'search' as const;

  constructor() {
    super('Search was cancelled');
  }
}

export type ExtractionError = MalformedResponseError | LlmUnavailableError;

export function isExtractionError(err: unknown): err is ExtractionError {
  return err instanceof MalformedResponseError || err instanceof LlmUnavailableError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
