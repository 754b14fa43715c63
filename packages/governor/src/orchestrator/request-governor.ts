import { createLogger } from '@workspace/logger';
import { BanDetector } from '../anti-blocking/ban-detector.js';
import { EmergencyProtocol } from '../anti-blocking/emergency-protocol.js';
import { PacingEngine } from '../anti-blocking/pacing-engine.js';
import { RetryStrategy } from '../anti-blocking/retry-strategy.js';
import type {
  RequestOutcome,
  ResponseSignal,
  RetryDecision,
} from '../anti-blocking/types.js';
import { loadGovernorConfigFromEnv } from '../config/loader.js';
import { PolicyResolver } from '../config/policy-resolver.js';
import type { GovernorConfig, Policy } from '../config/types.js';
import { CircuitOpenError } from '../errors.js';
import { FailureMonitor } from '../health/failure-monitor.js';
import type { FailureWindowOptions } from '../health/failure-window.js';
import { GovernorMetrics } from '../observability/metrics.js';
import { escalatePolicy } from '../observability/threat-level.js';
import { UserAgentIdentityPool } from '../session/identity-pool.js';
import type { Session } from '../session/session.js';
import { SessionManager } from '../session/session-manager.js';
import type { IdentityPool, RotationReason } from '../session/types.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { normalizeDomain } from '../utils/domain.js';
import { systemRandom, type RandomSource } from '../utils/random.js';
import { sleep } from '../utils/sleep.js';
import { DomainLock } from './domain-lock.js';
import type {
  Admission,
  AdmitResult,
  DomainStats,
  ReportResult,
} from './types.js';

const log = createLogger('RequestGovernor');

type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

type GovernorOptions = {
  random?: RandomSource;
  clock?: Clock;
  identityPool?: IdentityPool;
  metrics?: GovernorMetrics;
  window?: Partial<FailureWindowOptions>;
  sleep?: Sleeper;
};

type AcquireOptions = {
  signal?: AbortSignal;
};

/**
 * The single entry point for callers. `admit` before sending, honour the wait,
 * send, then `report` what came back. Check-then-act work for a domain runs
 * under that domain's lock; waiting never does.
 */
export class RequestGovernor {
  readonly metrics: GovernorMetrics;
  private readonly resolver: PolicyResolver;
  private readonly sessions: SessionManager;
  private readonly pacing: PacingEngine;
  private readonly monitor: FailureMonitor;
  private readonly detector: BanDetector;
  private readonly emergency: EmergencyProtocol;
  private readonly retry: RetryStrategy;
  private readonly lock: DomainLock;
  private readonly clock: Clock;
  private readonly sleep: Sleeper;

  constructor(config: GovernorConfig, options: GovernorOptions = {}) {
    const random = options.random ?? systemRandom;

    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? sleep;
    this.metrics = options.metrics ?? new GovernorMetrics();
    this.resolver = new PolicyResolver(config);
    this.sessions = new SessionManager({
      identityPool: options.identityPool ?? new UserAgentIdentityPool(random),
      random,
      clock: this.clock,
    });
    this.pacing = new PacingEngine(random);
    this.monitor = new FailureMonitor(options.window);
    this.detector = new BanDetector(config.emergency, random);
    this.emergency = new EmergencyProtocol({
      sessions: this.sessions,
      pacing: this.pacing,
      metrics: this.metrics,
    });
    this.retry = new RetryStrategy();
    this.lock = new DomainLock();
  }

  policyFor(domain: string): Policy {
    return this.resolver.resolve(domain);
  }

  async admit(domain: string): Promise<AdmitResult> {
    const key = normalizeDomain(domain);

    return this.lock.run<AdmitResult>(key, () => {
      const now = this.clock.now();
      const threat = this.monitor.threatLevel(key, now);
      const policy = escalatePolicy(this.resolver.resolve(key), threat);

      const circuit = this.monitor.tryAdmit(key, policy, now);
      if (!circuit.admitted) {
        this.metrics.increment('admit.rejected');
        log.info(`Rejected request to ${key}: circuit open`, { retryAt: circuit.retryAt });
        return { admitted: false, domain: key, reason: 'circuit-open', retryAt: circuit.retryAt };
      }

      let session = this.sessions.acquire(key, policy);
      let rotation: RotationReason | undefined = this.sessions.rotationReason(session, policy);
      if (
        rotation === undefined &&
        session.requestCount > 0 &&
        !this.monitor.isHealthy(key, policy, now)
      ) {
        rotation = 'unhealthy';
      }
      if (rotation !== undefined) {
        session = this.sessions.rotate(key, policy, rotation);
        this.metrics.increment('session.rotated');
      }

      this.sessions.recordRequest(session);
      const pacing = this.pacing.nextDelay(session, policy, now, threat);

      this.metrics.increment('admit.accepted');
      this.metrics.recordWait(pacing.delayMs);
      this.metrics.gauge(`recent-sends.${key}`, this.pacing.recentSends(key, now));

      return {
        admitted: true,
        domain: key,
        session,
        policy,
        waitMs: pacing.delayMs,
        sendAt: pacing.sendAt,
        pacing: pacing.reason,
        trial: circuit.trial,
        rotation,
      };
    });
  }

  /**
   * Sleeps until the admission's send time. When `signal` aborts, the send slot
   * and any circuit trial are handed back and the abort is rethrown.
   */
  async wait(admission: Admission, signal?: AbortSignal): Promise<void> {
    try {
      await this.sleep(admission.sendAt - this.clock.now(), signal);
    } catch (error) {
      await this.lock.run(admission.domain, () => {
        this.pacing.release(admission.domain, admission.sendAt);
        if (admission.trial) {
          this.monitor.releaseTrial(admission.domain);
        }
      });
      log.debug(`Abandoned wait for ${admission.domain}`, { sendAt: admission.sendAt });
      throw error;
    }
  }

  /**
   * `admit` then `wait`. Throws `CircuitOpenError` when the domain is not taking requests.
   */
  async acquire(domain: string, options: AcquireOptions = {}): Promise<Admission> {
    const result = await this.admit(domain);
    if (!result.admitted) {
      throw new CircuitOpenError(result.domain, result.retryAt);
    }

    await this.wait(result, options.signal);
    return result;
  }

  async report(
    domain: string,
    session: Session,
    outcome: RequestOutcome,
    signal?: ResponseSignal,
  ): Promise<ReportResult> {
    const key = normalizeDomain(domain);

    return this.lock.run<ReportResult>(key, () => {
      const policy = this.resolver.resolve(key);
      const now = this.clock.now();

      const event = signal
        ? this.detector.inspect(key, signal, this.monitor.captchaSightings(key, now), policy, now)
        : undefined;
      const captcha = signal?.captchaDetected ?? false;
      const success = outcome.success && event === undefined && !captcha;

      const health = this.monitor.report(
        key,
        { success, captcha, detected: event !== undefined, trial: outcome.trial },
        policy,
        now,
      );
      this.metrics.increment(success ? 'report.success' : 'report.failure');

      const applied = event ? this.emergency.apply(event, policy, session) : undefined;

      let decision: RetryDecision = { action: 'done' };
      if (!success) {
        decision = this.retry.decide({
          failure: this.retry.classify({ outcome, signal, event }),
          attempt: outcome.attempt ?? 0,
          policy,
          circuitOpen: health.circuit === 'open',
        });
      }

      if (decision.action === 'abandon') {
        log.info(`Abandoning request to ${key}`, {
          reason: decision.reason,
          failure: decision.failure,
          session: session.id,
        });
      }

      return {
        domain: key,
        success,
        decision,
        event,
        switchProxy: applied?.switchProxy ?? false,
        session: applied?.rotated ?? this.sessions.acquire(key, policy),
        healthy: this.monitor.isHealthy(key, policy, now),
        circuit: health.circuit,
        consecutiveFailures: health.consecutiveFailures,
        successRate: health.successRate,
      };
    });
  }

  stats(domain: string): DomainStats {
    const key = normalizeDomain(domain);
    const policy = this.resolver.resolve(key);
    const now = this.clock.now();
    const health = this.monitor.snapshot(key, now);

    return {
      domain: key,
      session: this.sessions.current(key),
      rotations: this.sessions.rotationCount(key),
      recentSends: this.pacing.recentSends(key, now),
      successRate: health.successRate,
      detectionRate: health.detectionRate,
      consecutiveFailures: health.consecutiveFailures,
      captchaSightings: health.captchaSightings,
      samples: health.samples,
      healthy: this.monitor.isHealthy(key, policy, now),
      circuit: health.circuit,
      circuitRetryAt: this.monitor.circuitRetryAt(key, policy),
      emergencyUntil: this.pacing.emergencyUntil(key, now),
      threatLevel: this.monitor.threatLevel(key, now),
    };
  }
}

type CreateGovernorOptions = GovernorOptions & {
  config?: GovernorConfig;
};

/**
 * Builds a governor from `options.config`, or from the file named by
 * `GOVERNOR_CONFIG`, and checks every configured site policy up front.
 */
export function createGovernor(options: CreateGovernorOptions = {}): RequestGovernor {
  const { config = loadGovernorConfigFromEnv(), ...rest } = options;
  const resolver = new PolicyResolver(config);
  resolver.validateAll();

  const governor = new RequestGovernor(config, rest);
  log.info('Governor ready', { sites: resolver.configuredDomains() });

  return governor;
}

export type { GovernorOptions, CreateGovernorOptions, AcquireOptions, Sleeper };
