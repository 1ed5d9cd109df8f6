/**
 * Request identity, session and pacing records shared by the fetch engine.
 */

export interface Viewport {
  width: number;
  height: number;
}

export interface RequestIdentity {
  readonly userAgent: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly viewport: Readonly<Viewport>;
  readonly timezoneId: string;
  readonly locale: string;
  readonly epochId: string;
}

export interface SessionState {
  readonly epochId: string;
  readonly epochIndex: number;
  readonly requestsIssued: number;
  readonly createdAt: number;
}

export interface DelayDecision {
  baseMs: number;
  jitterMs: number;
  longPauseMs: number;
  extendedPauseMs: number;
  isLongPause: boolean;
  isExtendedPause: boolean;
  penaltyFactor: number;
  totalMs: number;
}
