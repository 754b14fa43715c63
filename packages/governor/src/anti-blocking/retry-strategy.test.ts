import { describe, it, expect } from 'vitest';
import { DEFAULT_POLICY_SETTINGS } from '../config/defaults.js';
import { PolicyResolver } from '../config/policy-resolver.js';
import type { Policy, PolicyOverride } from '../config/types.js';
import { RetryStrategy } from './retry-strategy.js';
import type { EmergencyEvent, ResponseSignal } from './types.js';

function policyWith(override: PolicyOverride = {}): Policy {
  return new PolicyResolver({
    defaults: DEFAULT_POLICY_SETTINGS,
    sites: { 'kenney.nl': override },
  }).resolve('kenney.nl');
}

function signal(status: number, extra: Partial<ResponseSignal> = {}): ResponseSignal {
  return { status, bodyExcerpt: '', ...extra };
}

const failed = { success: false };

describe('RetryStrategy', () => {
  const strategy = new RetryStrategy();

  it('classifies by emergency event first', () => {
    const event: EmergencyEvent = {
      domain: 'kenney.nl',
      kind: 'ip-ban',
      detectedAt: 0,
      action: { type: 'switch_proxy_and_delay', delayMs: 60_000 },
    };

    expect(strategy.classify({ outcome: failed, signal: signal(200), event })).toBe('blocked');
  });

  it('classifies CAPTCHA responses as captcha', () => {
    expect(strategy.classify({ outcome: failed, signal: signal(200, { captchaDetected: true }) })).toBe(
      'captcha',
    );
  });

  it('classifies by status code', () => {
    expect(strategy.classify({ outcome: failed, signal: signal(403) })).toBe('blocked');
    expect(strategy.classify({ outcome: failed, signal: signal(429) })).toBe('rate-limited');
    expect(strategy.classify({ outcome: failed, signal: signal(503) })).toBe('server');
    expect(strategy.classify({ outcome: failed, signal: signal(404) })).toBe('client');
  });

  it('classifies transport errors as network', () => {
    expect(strategy.classify({ outcome: { success: false, error: 'read ECONNRESET' } })).toBe('network');
    expect(strategy.classify({ outcome: { success: false, error: 'Request timeout' } })).toBe('network');
    expect(strategy.classify({ outcome: failed })).toBe('network');
  });

  it('reads status codes from error messages without a response', () => {
    expect(strategy.classify({ outcome: { success: false, error: '429 Too Many Requests' } })).toBe(
      'rate-limited',
    );
    expect(strategy.classify({ outcome: { success: false, error: 'HTTP 403 Forbidden' } })).toBe('blocked');
  });

  it('treats an unexplained failure on a 200 as a server failure', () => {
    expect(strategy.classify({ outcome: { success: false, error: 'empty listing' }, signal: signal(200) })).toBe(
      'server',
    );
  });

  it('backs off exponentially from baseDelay', () => {
    const policy = policyWith();
    const delays = [0, 1, 2].map((attempt) => {
      const decision = strategy.decide({ failure: 'server', attempt, policy, circuitOpen: false });
      return decision.action === 'retry-after-backoff' ? decision.delayMs : undefined;
    });

    expect(delays).toEqual([2000, 4000, 8000]);
  });

  it('caps the backoff at maxDelay', () => {
    expect(strategy.backoff(3, policyWith({ retryAttempts: 5 }))).toBe(10_000);
  });

  it('uses a flat baseDelay without exponential backoff', () => {
    expect(strategy.backoff(2, policyWith({ exponentialBackoff: false }))).toBe(2000);
  });

  it('gives up once retryAttempts are used', () => {
    const policy = policyWith();

    expect(strategy.decide({ failure: 'network', attempt: 2, policy, circuitOpen: false })).toEqual({
      action: 'retry-now',
      failure: 'network',
      delayMs: 0,
    });
    expect(strategy.decide({ failure: 'network', attempt: 3, policy, circuitOpen: false })).toEqual({
      action: 'abandon',
      failure: 'network',
      reason: 'retry-exhausted',
    });
  });

  it('never retries client errors', () => {
    expect(strategy.decide({ failure: 'client', attempt: 0, policy: policyWith(), circuitOpen: false })).toEqual({
      action: 'abandon',
      failure: 'client',
      reason: 'client-error',
    });
  });

  it('abandons while the circuit is open', () => {
    expect(
      strategy.decide({ failure: 'rate-limited', attempt: 0, policy: policyWith(), circuitOpen: true }),
    ).toEqual({ action: 'abandon', failure: 'rate-limited', reason: 'circuit-open' });
  });
});
