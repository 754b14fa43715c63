import { describe, it, expect } from 'vitest';
import { DEFAULT_EMERGENCY_CONFIG, DEFAULT_POLICY_SETTINGS } from '../config/defaults.js';
import type { GovernorConfig, PolicyOverride } from '../config/types.js';
import { CircuitOpenError, PolicyViolationError } from '../errors.js';
import { toResponseSignal } from '../http/response-signal.js';
import { ManualClock } from '../utils/clock.js';
import { createSequenceRandom } from '../utils/random.js';
import { RequestGovernor, createGovernor } from './request-governor.js';
import type { Admission } from './types.js';

// Plain jitter: 2000ms base + 0.5 * 3000ms jitter = 3500ms
const SITE: PolicyOverride = { randomLongDelay: { enabled: false }, stealthMode: false };

function configWith(site: PolicyOverride = {}): GovernorConfig {
  return {
    defaults: DEFAULT_POLICY_SETTINGS,
    sites: { 'kenney.nl': { ...SITE, ...site } },
    emergency: DEFAULT_EMERGENCY_CONFIG,
  };
}

function setup(site: PolicyOverride = {}) {
  const clock = new ManualClock();
  const governor = new RequestGovernor(configWith(site), {
    random: createSequenceRandom([0.5]),
    clock,
    sleep: async () => undefined,
  });
  return { governor, clock };
}

async function admitted(governor: RequestGovernor, domain = 'kenney.nl'): Promise<Admission> {
  const result = await governor.admit(domain);
  if (!result.admitted) {
    throw new Error(`Expected an admission, circuit open until ${result.retryAt}`);
  }
  return result;
}

const failed = { success: false, attempt: 0, error: 'HTTP 500' };

describe('RequestGovernor', () => {
  it('admits with a jittered delay on a fresh session', async () => {
    const { governor } = setup();

    const admission = await admitted(governor, 'https://www.kenney.nl/assets');

    expect(admission.domain).toBe('kenney.nl');
    expect(admission.waitMs).toBe(3_500);
    expect(admission.sendAt).toBe(3_500);
    expect(admission.pacing).toBe('jitter');
    expect(admission.trial).toBe(false);
    expect(admission.rotation).toBeUndefined();
    expect(admission.session.requestCount).toBe(1);
    expect(governor.metrics.count('admit.accepted')).toBe(1);
    expect(governor.metrics.snapshot().gauges['recent-sends.kenney.nl']).toBe(1);
  });

  it('spaces concurrent admissions for one domain', async () => {
    const { governor } = setup();

    const results = await Promise.all([
      admitted(governor),
      admitted(governor),
      admitted(governor),
    ]);

    expect(results.map((admission) => admission.sendAt)).toEqual([3_500, 13_500, 23_500]);
    expect(results.map((admission) => admission.pacing)).toEqual(['jitter', 'burst', 'burst']);
  });

  it('puts the 51st admission on a new session when the limit is 50', async () => {
    const { governor } = setup({ maxRequestsPerSession: 50 });

    const admissions: Admission[] = [];
    for (let i = 0; i < 51; i++) {
      admissions.push(await admitted(governor));
    }

    const first = admissions[0]?.session;
    expect(admissions.slice(0, 50).every((admission) => admission.session === first)).toBe(true);
    expect(admissions[50]?.session).not.toBe(first);
    expect(admissions[50]?.rotation).toBe('request-limit');
    expect(governor.stats('kenney.nl').rotations).toBe(1);
  });

  it('rotates exactly once on a ban page and holds the domain back', async () => {
    const { governor } = setup();
    const admission = await admitted(governor);

    const result = await governor.report(
      'kenney.nl',
      admission.session,
      { success: false, attempt: 0, error: 'HTTP 403' },
      { status: 403, bodyExcerpt: '<h1>Access denied</h1>' },
    );

    expect(result.event?.kind).toBe('ip-ban');
    expect(result.session).not.toBe(admission.session);
    expect(result.session.reason).toBe('ip-ban');
    expect(result.switchProxy).toBe(false);
    expect(result.decision).toEqual({
      action: 'retry-after-backoff',
      failure: 'blocked',
      delayMs: 2_000,
    });

    const next = await admitted(governor);
    expect(next.session).toBe(result.session);
    expect(next.rotation).toBeUndefined();
    expect(next.sendAt).toBe(60_000);
    expect(next.pacing).toBe('emergency');
    expect(governor.stats('kenney.nl').rotations).toBe(1);
    expect(governor.metrics.count('session.rotated')).toBe(1);
  });

  it('rotates a shared session once when two requests on it are banned', async () => {
    const { governor } = setup();
    const first = await admitted(governor);
    const second = await admitted(governor);
    expect(second.session).toBe(first.session);

    const banned = { success: false, attempt: 0, error: 'HTTP 403' };
    const page = { status: 403, bodyExcerpt: '<h1>Access denied</h1>' };
    const r1 = await governor.report('kenney.nl', first.session, banned, page);
    const r2 = await governor.report('kenney.nl', second.session, banned, page);

    expect(r1.event?.kind).toBe('ip-ban');
    expect(r2.event?.kind).toBe('ip-ban');
    expect(r2.session).toBe(r1.session);
    expect(r1.session.currentState).toBe('active');
    expect(governor.stats('kenney.nl').rotations).toBe(1);
    expect(governor.metrics.count('session.rotated')).toBe(1);
    expect(governor.metrics.count('emergency.ip-ban')).toBe(2);
  });

  it('waits out Retry-After before the next admission', async () => {
    const { governor } = setup();
    const admission = await admitted(governor);

    const result = await governor.report(
      'kenney.nl',
      admission.session,
      { success: false, attempt: 0, error: 'HTTP 429' },
      toResponseSignal({ status: 429, headers: { 'retry-after': '45' } }),
    );

    expect(result.event?.action).toEqual({ type: 'backoff', delayMs: 45_000 });
    expect(result.session).toBe(admission.session);
    expect(governor.stats('kenney.nl').rotations).toBe(0);

    const next = await admitted(governor);
    expect(next.waitMs).toBe(45_000);
    expect(next.pacing).toBe('emergency');
    expect(next.rotation).toBe('unhealthy');
  });

  it('finishes successful requests', async () => {
    const { governor } = setup();
    const admission = await admitted(governor);

    const result = await governor.report('kenney.nl', admission.session, { success: true }, {
      status: 200,
      bodyExcerpt: '<p>assets</p>',
    });

    expect(result.success).toBe(true);
    expect(result.decision).toEqual({ action: 'done' });
    expect(result.healthy).toBe(true);
    expect(governor.metrics.count('report.success')).toBe(1);
  });

  it('counts a CAPTCHA on a 200 as a failure', async () => {
    const { governor } = setup();
    const admission = await admitted(governor);

    const result = await governor.report('kenney.nl', admission.session, { success: true }, {
      status: 200,
      bodyExcerpt: '',
      captchaDetected: true,
    });

    expect(result.success).toBe(false);
    expect(result.decision).toEqual({
      action: 'retry-after-backoff',
      failure: 'captcha',
      delayMs: 2_000,
    });
  });

  it('opens the circuit and lets one trial through after the recovery timeout', async () => {
    const { governor, clock } = setup({
      circuitBreaker: { failureThreshold: 2, recoveryTimeoutMs: 30_000 },
    });

    for (let i = 0; i < 2; i++) {
      const admission = await admitted(governor);
      await governor.report('kenney.nl', admission.session, failed, {
        status: 500,
        bodyExcerpt: '',
      });
    }

    expect(await governor.admit('kenney.nl')).toEqual({
      admitted: false,
      domain: 'kenney.nl',
      reason: 'circuit-open',
      retryAt: 30_000,
    });
    await expect(governor.acquire('kenney.nl')).rejects.toBeInstanceOf(CircuitOpenError);
    expect(governor.metrics.count('admit.rejected')).toBe(2);

    clock.set(30_000);
    const trial = await admitted(governor);
    expect(trial.trial).toBe(true);
    expect(await governor.admit('kenney.nl')).toMatchObject({ admitted: false, retryAt: 60_000 });

    const result = await governor.report(
      'kenney.nl',
      trial.session,
      { success: true, trial: true },
      { status: 200, bodyExcerpt: 'ok' },
    );
    expect(result.circuit).toBe('closed');
    expect((await admitted(governor)).trial).toBe(false);
  });

  it('ignores a late success from before the circuit opened while the trial runs', async () => {
    const { governor, clock } = setup({
      circuitBreaker: { failureThreshold: 2, recoveryTimeoutMs: 30_000 },
    });
    const a = await admitted(governor);
    const b = await admitted(governor);
    const late = await admitted(governor);

    await governor.report('kenney.nl', a.session, failed, { status: 500, bodyExcerpt: '' });
    await governor.report('kenney.nl', b.session, failed, { status: 500, bodyExcerpt: '' });
    expect(governor.stats('kenney.nl').circuit).toBe('open');

    clock.set(30_000);
    const trial = await admitted(governor);
    expect(trial.trial).toBe(true);

    const lateResult = await governor.report(
      'kenney.nl',
      late.session,
      { success: true },
      { status: 200, bodyExcerpt: 'ok' },
    );
    expect(lateResult.circuit).toBe('half-open');
    expect(governor.stats('kenney.nl').circuit).toBe('half-open');

    const trialResult = await governor.report(
      'kenney.nl',
      trial.session,
      { success: true, trial: true },
      { status: 200, bodyExcerpt: 'ok' },
    );
    expect(trialResult.circuit).toBe('closed');
  });

  it('escalates pacing and session limits once a domain turns critical', async () => {
    const { governor, clock } = setup({ circuitBreaker: { enabled: false } });
    const first = await admitted(governor);
    for (let i = 0; i < 10; i++) {
      await governor.report('kenney.nl', first.session, failed);
    }
    expect(governor.stats('kenney.nl').threatLevel).toBe('critical');

    clock.set(120_000);
    const next = await admitted(governor);

    // (3500 * 1.5 stealth) + 10000 critical pause
    expect(next.waitMs).toBe(15_250);
    expect(next.pacing).toBe('jitter');
    expect(next.rotation).toBe('unhealthy');
    expect(next.policy.stealthMode).toBe(true);
    expect(next.policy.maxRequestsPerSession).toBe(3);
    expect(governor.policyFor('kenney.nl').stealthMode).toBe(false);
  });

  it('abandons once the circuit has opened', async () => {
    const { governor } = setup({ circuitBreaker: { failureThreshold: 1 } });
    const admission = await admitted(governor);

    const result = await governor.report('kenney.nl', admission.session, failed, {
      status: 500,
      bodyExcerpt: '',
    });

    expect(result.circuit).toBe('open');
    expect(result.decision).toEqual({ action: 'abandon', failure: 'server', reason: 'circuit-open' });
  });

  it('hands back the send slot and the trial when a wait is aborted', async () => {
    const clock = new ManualClock();
    const governor = new RequestGovernor(configWith({ circuitBreaker: { failureThreshold: 1 } }), {
      random: createSequenceRandom([0.5]),
      clock,
    });

    const first = await admitted(governor);
    await governor.report('kenney.nl', first.session, failed, { status: 500, bodyExcerpt: '' });
    clock.set(120_000);

    const trial = await admitted(governor);
    expect(trial.trial).toBe(true);
    expect(governor.stats('kenney.nl').recentSends).toBe(1);

    const controller = new AbortController();
    controller.abort();
    await expect(governor.wait(trial, controller.signal)).rejects.toMatchObject({
      name: 'AbortError',
    });

    expect(governor.stats('kenney.nl').recentSends).toBe(0);
    expect((await admitted(governor)).trial).toBe(true);
  });

  it('reports per-domain stats', async () => {
    const { governor } = setup();
    const admission = await admitted(governor);
    await governor.report(
      'kenney.nl',
      admission.session,
      { success: false, attempt: 0, error: 'HTTP 403' },
      { status: 403, bodyExcerpt: 'Access denied' },
    );

    const stats = governor.stats('https://kenney.nl/');
    expect(stats).toMatchObject({
      domain: 'kenney.nl',
      rotations: 1,
      recentSends: 1,
      successRate: 0,
      detectionRate: 1,
      consecutiveFailures: 1,
      captchaSightings: 0,
      samples: 1,
      healthy: false,
      circuit: 'closed',
      circuitRetryAt: undefined,
      emergencyUntil: 60_000,
      threatLevel: 'low',
    });
    expect(stats.session?.reason).toBe('ip-ban');
  });
});

describe('createGovernor', () => {
  it('rejects configurations with an invalid site policy', () => {
    expect(() => createGovernor({ config: configWith({ baseDelayMs: 20_000 }) })).toThrow(
      PolicyViolationError,
    );
  });

  it('builds a governor from a valid configuration', () => {
    const governor = createGovernor({ config: configWith() });

    expect(governor.policyFor('kenney.nl').stealthMode).toBe(false);
  });
});
