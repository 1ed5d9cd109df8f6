/**
 * Rate Controller: paces one search session and owns its identity epoch.
 *
 * One instance per search. Never shared, so no locking.
 */

import type { EvasionConfig } from './config';
import { nextDelay, nextIdentity } from './evasion-policy';
import { createLogger, type Logger } from './logger';
import { defaultRandom, type RandomSource } from './random';
import { createSession, recordRequest, shouldRotate } from './session';
import { sleep as defaultSleep, throwIfCancelled, type Sleep } from './sleep';
import type { DelayDecision, RequestIdentity, SessionState } from './types';

export interface RateControllerOptions {
  random?: RandomSource;
  sleep?: Sleep;
  now?: () => number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface RequestTicket {
  identity: RequestIdentity;
  delay: DelayDecision;
  session: SessionState;
}

export type RotationListener = (session: SessionState, identity: RequestIdentity) => void | Promise<void>;

export class RateController {
  private readonly random: RandomSource;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;
  private readonly listeners = new Set<RotationListener>();

  private session: SessionState;
  private identity: RequestIdentity;
  private requestIndex = 0;
  private pendingPenalty = 1;

  constructor(
    private readonly config: EvasionConfig,
    options: RateControllerOptions = {},
  ) {
    this.random = options.random ?? defaultRandom;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.signal = options.signal;
    this.logger = options.logger ?? createLogger('rate-controller');
    this.session = createSession(0, this.random, this.now());
    this.identity = nextIdentity(this.session, this.random);
  }

  get sessionState(): SessionState {
    return this.session;
  }

  get currentIdentity(): RequestIdentity {
    return this.identity;
  }

  /** Wait out the next delay, then hand back the identity to use. */
  async beforeRequest(): Promise<RequestTicket> {
    throwIfCancelled(this.signal);
    this.requestIndex += 1;
    const delay = nextDelay(this.requestIndex, this.config, this.random, this.pendingPenalty);
    this.pendingPenalty = 1;

    if (delay.isLongPause || delay.isExtendedPause) {
      this.logger.debug(`Pausing ${delay.totalMs}ms before request ${this.requestIndex}`, {
        longPauseMs: delay.longPauseMs,
        extendedPauseMs: delay.extendedPauseMs,
      });
    }
    await this.sleep(delay.totalMs, this.signal);
    throwIfCancelled(this.signal);

    return { identity: this.identity, delay, session: this.session };
  }

  /** Count the request (whatever its outcome). Returns true when the session rotated. */
  async afterRequest(): Promise<boolean> {
    this.session = recordRequest(this.session);
    if (!shouldRotate(this.session, this.config, this.now())) return false;

    const previous = this.session;
    this.session = createSession(previous.epochIndex + 1, this.random, this.now());
    this.identity = nextIdentity(this.session, this.random);
    this.logger.info(`Session rotated after ${previous.requestsIssued} requests`, {
      epochIndex: this.session.epochIndex,
    });
    for (const listener of this.listeners) {
      try {
        await listener(this.session, this.identity);
      } catch (error) {
        // The epoch has already moved on; a listener failure must not cost the request.
        this.logger.warn('Rotation listener failed', {
          epochIndex: this.session.epochIndex,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return true;
  }

  /** Scale the next delay by the rate-limit penalty. */
  penalize(): void {
    this.pendingPenalty = this.config.rateLimitPenalty;
    this.logger.warn(`Rate limited; next delay scaled by ${this.config.rateLimitPenalty}`);
  }

  onRotate(listener: RotationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
