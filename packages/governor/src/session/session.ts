import { randomUUID } from 'node:crypto';
import type {
  Fingerprint,
  RotationReason,
  SessionInfo,
  SessionState,
} from './types.js';

type SessionInit = {
  domain: string;
  createdAt: number;
  fingerprint: Fingerprint;
  /** Reuse an existing cookie jar instead of opening a new one. */
  cookieJar?: string;
  renewalJitterMs: number;
  reason: RotationReason;
};

/**
 * One identity used for a bounded run of requests against a single domain.
 */
export class Session {
  readonly id: string;
  readonly domain: string;
  readonly createdAt: number;
  readonly fingerprint: Fingerprint;
  readonly cookieJar: string;
  readonly renewalJitterMs: number;
  readonly reason: RotationReason;
  private state: SessionState;
  private requests: number;

  constructor(init: SessionInit) {
    this.id = randomUUID();
    this.domain = init.domain;
    this.createdAt = init.createdAt;
    this.fingerprint = init.fingerprint;
    this.cookieJar = init.cookieJar ?? `jar-${randomUUID()}`;
    this.renewalJitterMs = init.renewalJitterMs;
    this.reason = init.reason;
    this.state = 'active';
    this.requests = 0;
  }

  /**
   * Returns the new request count. Counts only ever go up.
   */
  recordRequest(): number {
    this.requests += 1;
    return this.requests;
  }

  markExpiring(): void {
    if (this.state === 'active') {
      this.state = 'expiring';
    }
  }

  retire(): void {
    this.state = 'retired';
  }

  ageMs(now: number): number {
    return Math.max(0, now - this.createdAt);
  }

  get requestCount(): number {
    return this.requests;
  }

  get currentState(): SessionState {
    return this.state;
  }

  get info(): SessionInfo {
    return {
      id: this.id,
      domain: this.domain,
      state: this.state,
      requestCount: this.requests,
      createdAt: this.createdAt,
      fingerprint: { ...this.fingerprint },
      cookieJar: this.cookieJar,
      reason: this.reason,
    };
  }
}

export type { SessionInit };
