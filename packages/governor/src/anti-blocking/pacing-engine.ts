import { createLogger } from '@workspace/logger';
import type { Policy } from '../config/types.js';
import { threatExtraDelay, type ThreatLevel } from '../observability/threat-level.js';
import type { Session } from '../session/session.js';
import { chance, uniform, type RandomSource } from '../utils/random.js';
import { RequestLog } from './request-log.js';
import type { EmergencyKind, PacingDecision, PacingReason } from './types.js';

const log = createLogger('PacingEngine');

const MINUTE_MS = 60_000;
const HOUR_MS = 3_600_000;

const AGGRESSIVE_FACTOR = 0.5;
const AGGRESSIVE_FLOOR_MS = 250;
const STEALTH_FACTOR = 1.5;

type DomainPacing = {
  minute: RequestLog;
  hour: RequestLog;
  emergency?: { until: number; kind: EmergencyKind };
};

/**
 * Decides when the next request to a domain may go out. The jittered delay is
 * only a starting point: emergency waits, burst spacing and the sliding rate
 * windows can all push the send time later, and the latest one wins.
 */
export class PacingEngine {
  private readonly random: RandomSource;
  private readonly domains: Map<string, DomainPacing>;

  constructor(random: RandomSource) {
    this.random = random;
    this.domains = new Map();
  }

  /**
   * At high and critical threat a random extra pause is added to the jittered
   * delay; it is not bounded by `maxDelay`.
   */
  nextDelay(
    session: Session,
    policy: Policy,
    now: number,
    threat: ThreatLevel = 'low',
  ): PacingDecision {
    const state = this.stateFor(session.domain);
    state.minute.prune(now);
    state.hour.prune(now);

    const jitter = this.jitterDelay(policy);
    const extra = threatExtraDelay(threat);
    let sendAt = now + jitter.delayMs + (extra ? uniform(this.random, extra[0], extra[1]) : 0);
    let reason: PacingReason = jitter.reason;

    const emergencyUntil = this.activeEmergency(state, now);
    if (emergencyUntil !== undefined && emergencyUntil > sendAt) {
      sendAt = emergencyUntil;
      reason = 'emergency';
    }

    const lastSend = state.minute.latest;
    if (policy.burstProtection && lastSend !== undefined) {
      const spacedAt = lastSend + MINUTE_MS / policy.maxRequestsPerMinute;
      if (spacedAt > sendAt) {
        sendAt = spacedAt;
        reason = 'burst';
      }
    }

    const limitedAt = this.rateLimitedSlot(state, policy, sendAt);
    if (limitedAt > sendAt) {
      sendAt = limitedAt;
      reason = 'rate-limit';
    }

    state.minute.add(sendAt);
    state.hour.add(sendAt);

    const decision: PacingDecision = { delayMs: sendAt - now, sendAt, reason };
    log.debug(`Paced ${session.domain}`, { session: session.id, ...decision });

    return decision;
  }

  /**
   * Forces every send to `domain` to wait until at least `now + delayMs`.
   * A shorter wait never replaces a longer one that is still running.
   */
  noteEmergencyDelay(
    domain: string,
    kind: EmergencyKind,
    delayMs: number,
    now: number,
  ): void {
    const state = this.stateFor(domain);
    const until = now + Math.max(0, delayMs);
    const current = this.activeEmergency(state, now);
    if (current !== undefined && current >= until) {
      return;
    }

    state.emergency = { until, kind };
    log.info(`Emergency wait for ${domain}`, { kind, delayMs, until });
  }

  emergencyUntil(domain: string, now: number): number | undefined {
    const state = this.domains.get(domain);
    return state ? this.activeEmergency(state, now) : undefined;
  }

  /**
   * Gives back a reservation whose caller will not send.
   */
  release(domain: string, sendAt: number): void {
    const state = this.domains.get(domain);
    if (!state) {
      return;
    }
    const released = state.minute.remove(sendAt);
    state.hour.remove(sendAt);
    if (released) {
      log.debug(`Released send slot for ${domain}`, { sendAt });
    }
  }

  /** Sends reserved inside the last minute, as seen from `now`. */
  recentSends(domain: string, now: number): number {
    return this.domains.get(domain)?.minute.countSince(now - MINUTE_MS) ?? 0;
  }

  clear(): void {
    this.domains.clear();
  }

  private jitterDelay(policy: Policy): { delayMs: number; reason: PacingReason } {
    const longDelay = policy.randomLongDelay;
    if (longDelay.enabled && chance(this.random, longDelay.probability)) {
      return {
        delayMs: Math.max(
          uniform(this.random, longDelay.minMs, longDelay.maxMs),
          policy.minDelayMs,
        ),
        reason: 'long-delay',
      };
    }

    let delayMs = Math.min(
      policy.baseDelayMs + uniform(this.random, 0, policy.delayJitterMs),
      policy.maxDelayMs,
    );

    if (policy.aggressiveMode) {
      const floor = Math.max(AGGRESSIVE_FLOOR_MS, policy.minDelayMs);
      delayMs = Math.min(Math.max(delayMs * AGGRESSIVE_FACTOR, floor), policy.maxDelayMs);
    } else if (policy.stealthMode) {
      delayMs = Math.min(delayMs * STEALTH_FACTOR, policy.maxDelayMs);
    }

    return { delayMs: Math.max(delayMs, policy.minDelayMs), reason: 'jitter' };
  }

  private rateLimitedSlot(state: DomainPacing, policy: Policy, candidate: number): number {
    const perHour = policy.maxRequestsPerHour;
    let slot = candidate;

    for (;;) {
      const minuteSlot = state.minute.earliestSlot(slot, policy.maxRequestsPerMinute);
      const hourSlot =
        perHour === undefined ? minuteSlot : state.hour.earliestSlot(minuteSlot, perHour);
      if (hourSlot === slot) {
        return slot;
      }
      slot = hourSlot;
    }
  }

  private activeEmergency(state: DomainPacing, now: number): number | undefined {
    if (!state.emergency) {
      return undefined;
    }
    if (state.emergency.until <= now) {
      state.emergency = undefined;
      return undefined;
    }
    return state.emergency.until;
  }

  private stateFor(domain: string): DomainPacing {
    let state = this.domains.get(domain);
    if (!state) {
      state = { minute: new RequestLog(MINUTE_MS), hour: new RequestLog(HOUR_MS) };
      this.domains.set(domain, state);
    }
    return state;
  }
}
