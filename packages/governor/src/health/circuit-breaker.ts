import { createLogger } from '@workspace/logger';
import type { CircuitBreakerPolicy } from '../config/types.js';

const log = createLogger('CircuitBreaker');

type CircuitState = 'closed' | 'open' | 'half-open';

type CircuitAdmission =
  | { admitted: true; trial: boolean }
  | { admitted: false; retryAt: number };

/**
 * Three-state guard for one domain.
 *
 * closed: counts consecutive failures; `failureThreshold` of them opens it.
 * open: admits nothing until `recoveryTimeout` has passed; reports are ignored.
 * half-open: the first admission after the timeout is the single trial; its
 * success closes the circuit, its failure reopens it with a fresh timer.
 * Late reports from requests admitted before the circuit opened are ignored.
 */
export class CircuitBreaker {
  private readonly domain: string;
  private state: CircuitState;
  private failures: number;
  private openedAt: number;
  private trialInFlight: boolean;

  constructor(domain: string) {
    this.domain = domain;
    this.state = 'closed';
    this.failures = 0;
    this.openedAt = 0;
    this.trialInFlight = false;
  }

  get currentState(): CircuitState {
    return this.state;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  retryAt(policy: CircuitBreakerPolicy): number | undefined {
    return this.state === 'open' ? this.openedAt + policy.recoveryTimeoutMs : undefined;
  }

  tryAdmit(policy: CircuitBreakerPolicy, now: number): CircuitAdmission {
    if (!policy.enabled) {
      return { admitted: true, trial: false };
    }

    switch (this.state) {
      case 'closed':
        return { admitted: true, trial: false };

      case 'open': {
        const retryAt = this.openedAt + policy.recoveryTimeoutMs;
        if (now < retryAt) {
          return { admitted: false, retryAt };
        }
        this.transitionTo('half-open', now);
        this.trialInFlight = true;
        return { admitted: true, trial: true };
      }

      case 'half-open':
        if (this.trialInFlight) {
          // One trial at a time; callers come back when it has reported.
          return { admitted: false, retryAt: now + policy.recoveryTimeoutMs };
        }
        this.trialInFlight = true;
        return { admitted: true, trial: true };
    }
  }

  recordSuccess(policy: CircuitBreakerPolicy, now: number, trial = false): void {
    if (!policy.enabled || this.state === 'open') {
      return;
    }

    if (this.state === 'half-open') {
      if (trial) {
        this.transitionTo('closed', now);
      }
      return;
    }
    this.failures = 0;
  }

  recordFailure(policy: CircuitBreakerPolicy, now: number, trial = false): void {
    if (!policy.enabled || this.state === 'open') {
      return;
    }

    if (this.state === 'half-open') {
      if (trial) {
        this.transitionTo('open', now);
      }
      return;
    }

    this.failures += 1;
    if (this.failures >= policy.failureThreshold) {
      this.transitionTo('open', now);
    }
  }

  /**
   * The trial's caller gave up before sending; the next admission becomes the trial.
   */
  releaseTrial(): void {
    if (this.state === 'half-open') {
      this.trialInFlight = false;
    }
  }

  private transitionTo(next: CircuitState, now: number): void {
    const previous = this.state;
    this.state = next;

    if (next === 'open') {
      this.openedAt = now;
      this.trialInFlight = false;
    } else if (next === 'closed') {
      this.failures = 0;
      this.trialInFlight = false;
    }

    const message = `Circuit for ${this.domain} ${previous} -> ${next}`;
    if (next === 'open') {
      log.warn(message, { failures: this.failures, openedAt: now });
    } else {
      log.info(message);
    }
  }
}

export type { CircuitState, CircuitAdmission };
