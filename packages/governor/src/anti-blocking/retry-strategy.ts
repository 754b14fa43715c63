import type { Policy } from '../config/types.js';
import type {
  EmergencyEvent,
  FailureKind,
  RequestOutcome,
  ResponseSignal,
  RetryDecision,
} from './types.js';

type ClassifyInput = {
  outcome: RequestOutcome;
  signal?: ResponseSignal;
  event?: EmergencyEvent;
};

type DecideInput = {
  failure: FailureKind;
  attempt: number;
  policy: Policy;
  circuitOpen: boolean;
};

const NETWORK_MARKERS = [
  'timeout',
  'timed out',
  'econnreset',
  'econnrefused',
  'enotfound',
  'eai_again',
  'socket hang up',
  'network',
];

export class RetryStrategy {
  classify(input: ClassifyInput): FailureKind {
    switch (input.event?.kind) {
      case 'ip-ban':
        return 'blocked';
      case 'rate-limited':
        return 'rate-limited';
      case 'captcha-flood':
        return 'captcha';
      case undefined:
        break;
    }

    if (input.signal?.captchaDetected) {
      return 'captcha';
    }

    const status = input.signal?.status ?? 0;
    if (status === 403) {
      return 'blocked';
    }
    if (status === 429) {
      return 'rate-limited';
    }
    if (status >= 500) {
      return 'server';
    }
    if (status >= 400) {
      return 'client';
    }

    const message = input.outcome.error?.toLowerCase() ?? '';
    if (message.includes('403')) {
      return 'blocked';
    }
    if (message.includes('429') || message.includes('too many requests')) {
      return 'rate-limited';
    }
    if (status === 0 && (message === '' || NETWORK_MARKERS.some((marker) => message.includes(marker)))) {
      return 'network';
    }

    return 'server';
  }

  decide(input: DecideInput): RetryDecision {
    const { failure, attempt, policy } = input;

    if (input.circuitOpen) {
      return { action: 'abandon', failure, reason: 'circuit-open' };
    }
    if (failure === 'client') {
      return { action: 'abandon', failure, reason: 'client-error' };
    }
    if (attempt >= policy.retryAttempts) {
      return { action: 'abandon', failure, reason: 'retry-exhausted' };
    }
    if (failure === 'network') {
      return { action: 'retry-now', failure, delayMs: 0 };
    }

    return { action: 'retry-after-backoff', failure, delayMs: this.backoff(attempt, policy) };
  }

  /**
   * `baseDelay * 2^attempt`, capped at `maxDelay`. Flat `baseDelay` without exponential backoff.
   */
  backoff(attempt: number, policy: Policy): number {
    if (!policy.exponentialBackoff) {
      return policy.baseDelayMs;
    }
    return Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
  }
}

export type { ClassifyInput, DecideInput };
