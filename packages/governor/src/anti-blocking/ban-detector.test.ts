import { describe, it, expect } from 'vitest';
import { DEFAULT_EMERGENCY_CONFIG, DEFAULT_POLICY_SETTINGS } from '../config/defaults.js';
import { PolicyResolver } from '../config/policy-resolver.js';
import type { EmergencyConfig } from '../config/types.js';
import { createSequenceRandom } from '../utils/random.js';
import { BanDetector } from './ban-detector.js';

const policy = new PolicyResolver({ defaults: DEFAULT_POLICY_SETTINGS, sites: {} }).resolve(
  'kenney.nl',
);

function detectorWith(config: EmergencyConfig = DEFAULT_EMERGENCY_CONFIG): BanDetector {
  return new BanDetector(config, createSequenceRandom([0.5]));
}

describe('BanDetector', () => {
  it('reports an IP ban for 403 with a ban page, ahead of a CAPTCHA flood', () => {
    const event = detectorWith().inspect(
      'kenney.nl',
      { status: 403, bodyExcerpt: '<h1>Access denied</h1>', captchaDetected: true },
      5,
      policy,
      1_000,
    );

    expect(event).toEqual({
      domain: 'kenney.nl',
      kind: 'ip-ban',
      detectedAt: 1_000,
      action: { type: 'switch_proxy_and_delay', delayMs: 60_000 },
    });
  });

  it('matches ban indicators case-insensitively on any status', () => {
    const event = detectorWith().inspect(
      'kenney.nl',
      { status: 200, bodyExcerpt: 'Sorry, YOU HAVE BEEN BLOCKED from this site.' },
      0,
      policy,
      0,
    );

    expect(event?.kind).toBe('ip-ban');
  });

  it('honours Retry-After exactly on a 429', () => {
    const event = detectorWith().inspect(
      'kenney.nl',
      { status: 429, bodyExcerpt: 'slow down', retryAfterMs: 45_000 },
      0,
      policy,
      0,
    );

    expect(event?.kind).toBe('rate-limited');
    expect(event?.action).toEqual({ type: 'backoff', delayMs: 45_000 });
  });

  it('falls back to the default backoff without Retry-After', () => {
    const event = detectorWith().inspect('kenney.nl', { status: 429, bodyExcerpt: '' }, 0, policy, 0);

    expect(event?.action).toEqual({ type: 'backoff', delayMs: 60_000 });
  });

  it('ignores Retry-After when told not to respect it', () => {
    const detector = detectorWith({
      ...DEFAULT_EMERGENCY_CONFIG,
      rateLimit: { ...DEFAULT_EMERGENCY_CONFIG.rateLimit, respectRetryAfter: false },
    });

    const event = detector.inspect(
      'kenney.nl',
      { status: 429, bodyExcerpt: '', retryAfterMs: 45_000 },
      0,
      policy,
      0,
    );

    expect(event?.action.delayMs).toBe(60_000);
  });

  it('treats a 429 as a ban when rate-limit detection is off', () => {
    const detector = detectorWith({
      ...DEFAULT_EMERGENCY_CONFIG,
      rateLimit: { ...DEFAULT_EMERGENCY_CONFIG.rateLimit, enabled: false },
    });

    const event = detector.inspect('kenney.nl', { status: 429, bodyExcerpt: '' }, 0, policy, 0);

    expect(event?.kind).toBe('ip-ban');
  });

  it('raises a CAPTCHA flood once the sightings reach the threshold', () => {
    const detector = detectorWith();
    const challenge = { status: 200, bodyExcerpt: '', captchaDetected: true };

    expect(detector.inspect('kenney.nl', challenge, 1, policy, 0)).toBeUndefined();
    expect(detector.inspect('kenney.nl', challenge, 2, policy, 0)).toEqual({
      domain: 'kenney.nl',
      kind: 'captcha-flood',
      detectedAt: 0,
      action: { type: 'long_delay_and_profile_change', delayMs: 75_000 },
    });
  });

  it('stays quiet for disabled rules and ordinary responses', () => {
    const detector = detectorWith({
      ...DEFAULT_EMERGENCY_CONFIG,
      ipBan: { ...DEFAULT_EMERGENCY_CONFIG.ipBan, enabled: false },
    });

    expect(detector.inspect('kenney.nl', { status: 403, bodyExcerpt: 'Access denied' }, 0, policy, 0)).toBeUndefined();
    expect(detectorWith().inspect('kenney.nl', { status: 200, bodyExcerpt: '<p>assets</p>' }, 0, policy, 0)).toBeUndefined();
  });
});
