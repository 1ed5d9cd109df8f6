import type { EvasionConfig } from './config';
import { randomHex, type RandomSource } from './random';
import type { SessionState } from './types';

export function createSession(epochIndex: number, random: RandomSource, now: number): SessionState {
  return Object.freeze({
    epochId: `${epochIndex}-${randomHex(random, 8)}`,
    epochIndex,
    requestsIssued: 0,
    createdAt: now,
  });
}

export function recordRequest(session: SessionState): SessionState {
  return Object.freeze({ ...session, requestsIssued: session.requestsIssued + 1 });
}

/** Rotate once the epoch has served its lifetime or grown too old. */
export function shouldRotate(
  session: SessionState,
  config: Pick<EvasionConfig, 'sessionLifetime' | 'sessionMaxAgeMs'>,
  now: number,
): boolean {
  return (
    session.requestsIssued >= config.sessionLifetime ||
    now - session.createdAt > config.sessionMaxAgeMs
  );
}
