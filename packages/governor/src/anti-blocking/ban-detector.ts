import { createLogger } from '@workspace/logger';
import type { EmergencyConfig, Policy } from '../config/types.js';
import { uniform, type RandomSource } from '../utils/random.js';
import { toAction, type EmergencyEvent, type ResponseSignal } from './types.js';

const log = createLogger('BanDetector');

/**
 * Turns a response signal into at most one emergency event. Rules run in a
 * fixed order and the first match wins:
 *
 * 1. IP ban: 403, a ban indicator in the body, or a 429 when rate-limit
 *    detection is off.
 * 2. CAPTCHA flood: enough CAPTCHA sightings inside the failure window.
 * 3. Rate limit: 429, waiting out `Retry-After` when it is honoured.
 */
export class BanDetector {
  private readonly config: EmergencyConfig;
  private readonly random: RandomSource;
  private readonly indicators: readonly string[];

  constructor(config: EmergencyConfig, random: RandomSource) {
    this.config = config;
    this.random = random;
    this.indicators = config.ipBan.indicators.map((indicator) => indicator.toLowerCase());
  }

  /**
   * @param captchaSightings CAPTCHA sightings already inside the failure-window
   *   horizon, not counting this signal.
   */
  inspect(
    domain: string,
    signal: ResponseSignal,
    captchaSightings: number,
    policy: Policy,
    now: number,
  ): EmergencyEvent | undefined {
    const { ipBan, captchaFlood, rateLimit } = this.config;

    if (ipBan.enabled && this.looksBanned(signal)) {
      return this.emit({
        domain,
        kind: 'ip-ban',
        detectedAt: now,
        action: toAction(ipBan.response, policy.circuitBreaker.recoveryTimeoutMs),
      });
    }

    const sightings = captchaSightings + (signal.captchaDetected ? 1 : 0);
    if (captchaFlood.enabled && signal.captchaDetected && sightings >= captchaFlood.threshold) {
      return this.emit({
        domain,
        kind: 'captcha-flood',
        detectedAt: now,
        action: toAction(
          captchaFlood.response,
          uniform(this.random, captchaFlood.minDelayMs, captchaFlood.maxDelayMs),
        ),
      });
    }

    if (rateLimit.enabled && signal.status === 429) {
      const retryAfter = signal.retryAfterMs;
      const delayMs =
        rateLimit.respectRetryAfter && retryAfter !== undefined
          ? retryAfter
          : rateLimit.defaultBackoffMs;
      return this.emit({
        domain,
        kind: 'rate-limited',
        detectedAt: now,
        action: { type: 'backoff', delayMs },
      });
    }

    return undefined;
  }

  private looksBanned(signal: ResponseSignal): boolean {
    if (signal.status === 403) {
      return true;
    }
    if (signal.status === 429 && !this.config.rateLimit.enabled) {
      return true;
    }

    const body = signal.bodyExcerpt.toLowerCase();
    return this.indicators.some((indicator) => body.includes(indicator));
  }

  private emit(event: EmergencyEvent): EmergencyEvent {
    log.warn(`Detected ${event.kind} on ${event.domain}`, {
      action: event.action.type,
      delayMs: event.action.delayMs,
    });
    return event;
  }
}
