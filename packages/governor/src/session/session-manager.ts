import { createLogger } from '@workspace/logger';
import type { Policy } from '../config/types.js';
import type { Clock } from '../utils/clock.js';
import { uniform, type RandomSource } from '../utils/random.js';
import { Session } from './session.js';
import type {
  Fingerprint,
  IdentityPool,
  RotationReason,
  SessionInfo,
} from './types.js';

const log = createLogger('SessionManager');

// Only limit-driven rotations may keep the previous fingerprint or cookie jar.
const CARRY_OVER_REASONS: ReadonlySet<RotationReason> = new Set([
  'request-limit',
  'max-age',
]);

type SessionManagerDeps = {
  identityPool: IdentityPool;
  random: RandomSource;
  clock: Clock;
};

/**
 * Keeps exactly one active session per domain and replaces it when policy
 * limits or detection signals say so. Callers serialize calls per domain.
 */
export class SessionManager {
  private readonly sessions: Map<string, Session>;
  private readonly rotations: Map<string, number>;
  private readonly deps: SessionManagerDeps;

  constructor(deps: SessionManagerDeps) {
    this.sessions = new Map();
    this.rotations = new Map();
    this.deps = deps;
  }

  acquire(domain: string, policy: Policy): Session {
    const existing = this.sessions.get(domain);
    if (existing && existing.currentState !== 'retired') {
      return existing;
    }

    return this.create(domain, policy, 'initial');
  }

  shouldRotate(session: Session, policy: Policy): boolean {
    return this.rotationReason(session, policy) !== undefined;
  }

  /**
   * Why the session has reached the end of its life, if it has. A session that
   * has reached a limit moves to `expiring`. A retired session has already been
   * replaced and has no reason left; `acquire` hands out its replacement.
   */
  rotationReason(session: Session, policy: Policy): RotationReason | undefined {
    if (session.currentState === 'retired') {
      return undefined;
    }

    let reason: RotationReason | undefined;
    if (session.requestCount >= policy.maxRequestsPerSession) {
      reason = 'request-limit';
    } else if (
      session.ageMs(this.deps.clock.now()) >=
      policy.maxSessionDurationMs - session.renewalJitterMs
    ) {
      reason = 'max-age';
    }

    if (reason) {
      session.markExpiring();
    }

    return reason;
  }

  rotate(domain: string, policy: Policy, reason: RotationReason): Session {
    const previous = this.sessions.get(domain);
    previous?.retire();

    const replacement = this.create(domain, policy, reason, previous);
    this.rotations.set(domain, (this.rotations.get(domain) ?? 0) + 1);

    log.info(`Rotated session for ${domain}`, {
      reason,
      previous: previous?.id,
      previousRequests: previous?.requestCount,
      next: replacement.id,
    });

    return replacement;
  }

  /** Whether `session` is still the one `acquire` would hand out for `domain`. */
  isCurrent(domain: string, session: Session): boolean {
    return this.sessions.get(domain) === session && session.currentState !== 'retired';
  }

  recordRequest(session: Session): number {
    return session.recordRequest();
  }

  current(domain: string): SessionInfo | undefined {
    return this.sessions.get(domain)?.info;
  }

  rotationCount(domain: string): number {
    return this.rotations.get(domain) ?? 0;
  }

  clear(): void {
    for (const session of this.sessions.values()) {
      session.retire();
    }
    this.sessions.clear();
    this.rotations.clear();
  }

  private create(
    domain: string,
    policy: Policy,
    reason: RotationReason,
    previous?: Session,
  ): Session {
    let fingerprint: Fingerprint | undefined;
    let cookieJar: string | undefined;
    if (previous && CARRY_OVER_REASONS.has(reason)) {
      if (
        !policy.sessionFingerprintRotation &&
        !policy.security.enableProfileRotation
      ) {
        fingerprint = previous.fingerprint;
      }
      if (policy.cookiePersistence) {
        cookieJar = previous.cookieJar;
      }
    }

    const session = new Session({
      domain,
      createdAt: this.deps.clock.now(),
      fingerprint: fingerprint ?? this.deps.identityPool.nextFingerprint(),
      cookieJar,
      renewalJitterMs: uniform(this.deps.random, 0, policy.sessionRenewalJitterMs),
      reason,
    });

    this.sessions.set(domain, session);
    log.debug(`Opened session ${session.id} for ${domain}`, { reason });

    return session;
  }
}

export type { SessionManagerDeps };
