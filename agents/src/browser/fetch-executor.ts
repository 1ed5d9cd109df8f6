/**
 * Fetch Executor - turns a URL into HTML under the Rate Controller's pacing.
 *
 * Responsibilities:
 * - Ask the Rate Controller for delay + identity before every attempt
 * - Retry transient failures (transport errors, 5xx, 429) with jittered backoff
 * - Fail fast on malformed URLs and other 4xx answers
 * - Reset the transport whenever the session epoch rotates
 *
 * LLM Usage: None
 */

import {
  FetchFailedError,
  RateLimitedError,
  SearchCancelledError,
  createLogger,
  defaultRandom,
  errorMessage,
  sleep as defaultSleep,
  throwIfCancelled,
  uniform,
  type Logger,
  type RandomSource,
  type RateController,
  type ScraperConfig,
  type Sleep,
} from '@roleradar/core';
import type { PageTransport } from './transport.js';

export type RetryConfig = Pick<
  ScraperConfig,
  'maxRetries' | 'retryBaseDelayMs' | 'retryMaxDelayMs' | 'pageLoadTimeoutMs'
>;

export interface FetchExecutorOptions {
  random?: RandomSource;
  sleep?: Sleep;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface FetchOutcome {
  html: string;
  status: number;
  url: string;
  attempts: number;
}

/** Backoff before retry number `attempt` (1-based): capped exponential, ±20 %. */
export function retryDelay(attempt: number, config: RetryConfig, random: RandomSource): number {
  const capped = Math.min(config.retryMaxDelayMs, config.retryBaseDelayMs * 2 ** (attempt - 1));
  return Math.round(capped * uniform(random, 0.8, 1.2));
}

function isFetchableUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class FetchExecutor {
  private readonly random: RandomSource;
  private readonly sleep: Sleep;
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;
  private readonly unsubscribe: () => void;

  constructor(
    private readonly transport: PageTransport,
    private readonly rateController: RateController,
    private readonly config: RetryConfig,
    options: FetchExecutorOptions = {},
  ) {
    this.random = options.random ?? defaultRandom;
    this.sleep = options.sleep ?? defaultSleep;
    this.signal = options.signal;
    this.logger = options.logger ?? createLogger('fetch-executor');
    this.unsubscribe = rateController.onRotate(() => transport.reset());
  }

  async fetch(url: string): Promise<string> {
    const outcome = await this.fetchPage(url);
    return outcome.html;
  }

  async fetchPage(url: string): Promise<FetchOutcome> {
    if (!isFetchableUrl(url)) {
      throw new FetchFailedError(url, 0, 'malformed URL');
    }

    const maxAttempts = this.config.maxRetries + 1;
    let lastStatus: number | undefined;
    let lastReason = 'no attempt made';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        const backoff = retryDelay(attempt - 1, this.config, this.random);
        this.logger.debug(`Retrying ${url} in ${backoff}ms (attempt ${attempt}/${maxAttempts})`);
        await this.sleep(backoff, this.signal);
      }

      const { identity } = await this.rateController.beforeRequest();
      let status: number;
      let html = '';
      let finalUrl = url;
      try {
        const response = await this.transport.load(url, identity, this.config.pageLoadTimeoutMs);
        status = response.status;
        html = response.html;
        finalUrl = response.url;
      } catch (err) {
        if (err instanceof SearchCancelledError) throw err;
        lastStatus = undefined;
        lastReason = errorMessage(err);
        this.logger.warn(`Transport error on ${url}: ${lastReason}`, { attempt });
        await this.rateController.afterRequest();
        throwIfCancelled(this.signal);
        continue;
      }
      await this.rateController.afterRequest();

      if (status >= 200 && status < 400) {
        this.logger.debug(`Fetched ${url}`, { status, attempt });
        return { html, status, url: finalUrl, attempts: attempt };
      }

      lastStatus = status;
      lastReason = `HTTP ${status}`;
      if (!isTransientStatus(status)) {
        this.logger.warn(`Non-transient HTTP ${status} for ${url}`);
        throw new FetchFailedError(url, attempt, lastReason, status);
      }
      if (status === 429) this.rateController.penalize();
      this.logger.warn(`Transient HTTP ${status} for ${url}`, { attempt });
    }

    if (lastStatus === 429) throw new RateLimitedError(url, maxAttempts);
    throw new FetchFailedError(url, maxAttempts, lastReason, lastStatus);
  }

  /** Stop listening for session rotation. The transport is closed by its owner. */
  dispose(): void {
    this.unsubscribe();
  }
}
