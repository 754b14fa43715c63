import { createLogger } from '@workspace/logger';
import type { Policy } from '../config/types.js';
import { assessThreatLevel, type ThreatLevel } from '../observability/threat-level.js';
import { CircuitBreaker, type CircuitAdmission, type CircuitState } from './circuit-breaker.js';
import { FailureWindow, type FailureWindowOptions } from './failure-window.js';

const log = createLogger('FailureMonitor');

/** Below this many outcomes the threat level stays low. */
const MIN_THREAT_SAMPLES = 10;

type MonitoredOutcome = {
  success: boolean;
  captcha?: boolean;
  detected?: boolean;
  /** The request was the circuit's half-open trial. */
  trial?: boolean;
};

type HealthSnapshot = {
  successRate: number;
  detectionRate: number;
  consecutiveFailures: number;
  captchaSightings: number;
  samples: number;
  circuit: CircuitState;
};

type DomainHealth = {
  window: FailureWindow;
  breaker: CircuitBreaker;
};

/**
 * Per-domain outcome tracking and circuit breaking. Every report counts:
 * reporting the same outcome twice records it twice.
 */
export class FailureMonitor {
  private readonly windowOptions: Partial<FailureWindowOptions> | undefined;
  private readonly domains: Map<string, DomainHealth>;

  constructor(windowOptions?: Partial<FailureWindowOptions>) {
    this.windowOptions = windowOptions;
    this.domains = new Map();
  }

  report(
    domain: string,
    outcome: MonitoredOutcome,
    policy: Policy,
    now: number,
  ): HealthSnapshot {
    const health = this.healthFor(domain);
    const captcha = outcome.captcha ?? false;

    health.window.record({
      success: outcome.success,
      captcha,
      detected: captcha || (outcome.detected ?? false),
      at: now,
    });

    const trial = outcome.trial ?? false;
    if (outcome.success) {
      health.breaker.recordSuccess(policy.circuitBreaker, now, trial);
    } else {
      health.breaker.recordFailure(policy.circuitBreaker, now, trial);
    }

    const snapshot = this.describe(health, now);
    if (!outcome.success) {
      log.debug(`Failure on ${domain}`, { ...snapshot });
    }

    return snapshot;
  }

  isHealthy(domain: string, policy: Policy, now: number): boolean {
    const health = this.domains.get(domain);
    if (!health) {
      return true;
    }

    if (health.window.consecutiveFailures() >= policy.maxFailedRequests) {
      return false;
    }

    return health.window.successRate(now) >= policy.successRateThreshold;
  }

  threatLevel(domain: string, now: number): ThreatLevel {
    const health = this.domains.get(domain);
    if (!health || health.window.size(now) < MIN_THREAT_SAMPLES) {
      return 'low';
    }
    return assessThreatLevel(health.window.successRate(now), health.window.detectionRate(now));
  }

  tryAdmit(domain: string, policy: Policy, now: number): CircuitAdmission {
    return this.healthFor(domain).breaker.tryAdmit(policy.circuitBreaker, now);
  }

  releaseTrial(domain: string): void {
    this.domains.get(domain)?.breaker.releaseTrial();
  }

  captchaSightings(domain: string, now: number): number {
    return this.domains.get(domain)?.window.captchaSightings(now) ?? 0;
  }

  circuitState(domain: string): CircuitState {
    return this.domains.get(domain)?.breaker.currentState ?? 'closed';
  }

  circuitRetryAt(domain: string, policy: Policy): number | undefined {
    return this.domains.get(domain)?.breaker.retryAt(policy.circuitBreaker);
  }

  snapshot(domain: string, now: number): HealthSnapshot {
    return this.describe(this.healthFor(domain), now);
  }

  clear(): void {
    this.domains.clear();
  }

  private describe(health: DomainHealth, now: number): HealthSnapshot {
    return {
      successRate: health.window.successRate(now),
      detectionRate: health.window.detectionRate(now),
      consecutiveFailures: health.window.consecutiveFailures(),
      captchaSightings: health.window.captchaSightings(now),
      samples: health.window.size(now),
      circuit: health.breaker.currentState,
    };
  }

  private healthFor(domain: string): DomainHealth {
    let health = this.domains.get(domain);
    if (!health) {
      health = {
        window: new FailureWindow(this.windowOptions),
        breaker: new CircuitBreaker(domain),
      };
      this.domains.set(domain, health);
    }
    return health;
  }
}

export type { MonitoredOutcome, HealthSnapshot };
