/**
 * Evasion policy: who the next request claims to be and how long to wait first.
 *
 * Pure functions. The only state is what callers pass in (session, request
 * index, random source), so concurrent searches never share anything but the
 * read-only pools below.
 */

import type { EvasionConfig } from './config';
import { pick, randomInt, uniform, type RandomSource } from './random';
import type { DelayDecision, RequestIdentity, SessionState, Viewport } from './types';

export const USER_AGENTS: readonly string[] = Object.freeze([
  // Chrome on Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/118.0.0.0 Safari/537.36',
  // Chrome on macOS
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36',
  // Firefox
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:120.0) Gecko/20100101 Firefox/120.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:121.0) Gecko/20100101 Firefox/121.0',
  // Safari
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/16.6 Safari/605.1.15',
  // Edge
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36 Edg/120.0.0.0',
  // Chrome on Linux
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
]);

const ACCEPT_VALUES = [
  'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
  'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,image/apng,*/*;q=0.8',
  'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
] as const;

/** Accept-Language value paired with the locale a browser would report for it. */
const LANGUAGES = [
  { header: 'en-US,en;q=0.9', locale: 'en-US' },
  { header: 'en-AU,en;q=0.9', locale: 'en-AU' },
  { header: 'en-GB,en;q=0.9', locale: 'en-GB' },
  { header: 'en-US,en;q=0.9,es;q=0.8', locale: 'en-US' },
] as const;

const FETCH_SITES = ['none', 'same-origin', 'cross-site'] as const;

export const VIEWPORTS: readonly Viewport[] = Object.freeze([
  { width: 1920, height: 1080 },
  { width: 1366, height: 768 },
  { width: 1536, height: 864 },
  { width: 1440, height: 900 },
  { width: 2560, height: 1440 },
  { width: 1280, height: 720 },
]);

export const TIMEZONES: readonly string[] = Object.freeze([
  'Australia/Sydney',
  'Australia/Melbourne',
  'Australia/Brisbane',
  'Australia/Perth',
  'Australia/Adelaide',
]);

/**
 * Draw a request identity for the given session. Each call is an independent
 * draw; the user agent is uniform over USER_AGENTS.
 */
export function nextIdentity(session: SessionState, random: RandomSource): RequestIdentity {
  const userAgent = pick(random, USER_AGENTS);
  const language = pick(random, LANGUAGES);

  const headers: Record<string, string> = {
    'User-Agent': userAgent,
    Accept: pick(random, ACCEPT_VALUES),
    'Accept-Language': language.header,
    'Accept-Encoding': 'gzip, deflate, br',
    'Upgrade-Insecure-Requests': '1',
    'Sec-Fetch-Dest': 'document',
    'Sec-Fetch-Mode': 'navigate',
    'Sec-Fetch-Site': pick(random, FETCH_SITES),
    'Sec-Fetch-User': '?1',
  };
  if (random() > 0.5) headers.DNT = '1';

  const viewport = pick(random, VIEWPORTS);

  return Object.freeze({
    userAgent,
    headers: Object.freeze(headers),
    viewport: Object.freeze({ ...viewport }),
    timezoneId: pick(random, TIMEZONES),
    locale: language.locale,
    epochId: session.epochId,
  });
}

/**
 * Pacing for the request with the given 1-based index.
 *
 * Long pause: fires when the index is a multiple of a divisor drawn fresh from
 * `longPauseEvery` on every call, so the boundary moves between 5 and 10.
 * Extended pause: independent `extendedPauseChance` roll. Both may fire.
 */
export function nextDelay(
  requestIndex: number,
  config: EvasionConfig,
  random: RandomSource,
  penaltyFactor = 1,
): DelayDecision {
  const baseMs = uniform(random, config.minDelayMs, config.maxDelayMs);
  const jitterMs = config.jitter ? uniform(random, 0, baseMs * config.jitterRatio) : 0;

  let longPauseMs = 0;
  let extendedPauseMs = 0;
  if (config.humanLike) {
    const divisor = randomInt(random, config.longPauseEvery.min, config.longPauseEvery.max);
    if (divisor > 0 && requestIndex % divisor === 0) {
      longPauseMs = uniform(random, config.longPauseMs.min, config.longPauseMs.max);
    }
    if (random() < config.extendedPauseChance) {
      extendedPauseMs = uniform(random, config.extendedPauseMs.min, config.extendedPauseMs.max);
    }
  }

  const factor = Math.max(1, penaltyFactor);
  return {
    baseMs,
    jitterMs,
    longPauseMs,
    extendedPauseMs,
    isLongPause: longPauseMs > 0,
    isExtendedPause: extendedPauseMs > 0,
    penaltyFactor: factor,
    totalMs: Math.round((baseMs + jitterMs + longPauseMs + extendedPauseMs) * factor),
  };
}
