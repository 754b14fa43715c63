import { createLogger } from '@workspace/logger';
import { PolicyViolationError } from '../errors.js';
import { normalizeDomain } from '../utils/domain.js';
import type {
  GovernorConfig,
  Policy,
  PolicyOverride,
  PolicySettings,
} from './types.js';

const log = createLogger('PolicyResolver');

/**
 * Field-by-field overlay of `override` onto `base`. Nested groups merge field
 * by field too. A layer that turns on aggressive or stealth mode without
 * mentioning the other one switches the other off: the later layer decides
 * the delay bias.
 */
function overlayPolicy(
  base: PolicySettings,
  override: PolicyOverride,
): PolicySettings {
  const merged: PolicySettings = {
    maxRequestsPerSession:
      override.maxRequestsPerSession ?? base.maxRequestsPerSession,
    maxSessionDurationMs:
      override.maxSessionDurationMs ?? base.maxSessionDurationMs,
    sessionRenewalJitterMs:
      override.sessionRenewalJitterMs ?? base.sessionRenewalJitterMs,
    cookiePersistence: override.cookiePersistence ?? base.cookiePersistence,
    sessionFingerprintRotation:
      override.sessionFingerprintRotation ?? base.sessionFingerprintRotation,

    baseDelayMs: override.baseDelayMs ?? base.baseDelayMs,
    maxDelayMs: override.maxDelayMs ?? base.maxDelayMs,
    delayJitterMs: override.delayJitterMs ?? base.delayJitterMs,
    minDelayMs: override.minDelayMs ?? base.minDelayMs,
    burstProtection: override.burstProtection ?? base.burstProtection,
    maxRequestsPerMinute:
      override.maxRequestsPerMinute ?? base.maxRequestsPerMinute,
    maxRequestsPerHour: override.maxRequestsPerHour ?? base.maxRequestsPerHour,
    humanLikePatterns: override.humanLikePatterns ?? base.humanLikePatterns,
    randomLongDelay: {
      enabled: override.randomLongDelay?.enabled ?? base.randomLongDelay.enabled,
      probability:
        override.randomLongDelay?.probability ??
        base.randomLongDelay.probability,
      minMs: override.randomLongDelay?.minMs ?? base.randomLongDelay.minMs,
      maxMs: override.randomLongDelay?.maxMs ?? base.randomLongDelay.maxMs,
    },

    maxFailedRequests: override.maxFailedRequests ?? base.maxFailedRequests,
    successRateThreshold:
      override.successRateThreshold ?? base.successRateThreshold,
    retryAttempts: override.retryAttempts ?? base.retryAttempts,
    exponentialBackoff: override.exponentialBackoff ?? base.exponentialBackoff,
    circuitBreaker: {
      enabled: override.circuitBreaker?.enabled ?? base.circuitBreaker.enabled,
      failureThreshold:
        override.circuitBreaker?.failureThreshold ??
        base.circuitBreaker.failureThreshold,
      recoveryTimeoutMs:
        override.circuitBreaker?.recoveryTimeoutMs ??
        base.circuitBreaker.recoveryTimeoutMs,
    },

    aggressiveMode: override.aggressiveMode ?? base.aggressiveMode,
    stealthMode: override.stealthMode ?? base.stealthMode,
    requiresJavaScript: override.requiresJavaScript ?? base.requiresJavaScript,
    requiresLogin: override.requiresLogin ?? base.requiresLogin,

    security: { ...base.security, ...definedOnly(override.security) },
    evasion: { ...base.evasion, ...definedOnly(override.evasion) },
  };

  if (override.aggressiveMode === true && override.stealthMode === undefined) {
    merged.stealthMode = false;
  }
  if (override.stealthMode === true && override.aggressiveMode === undefined) {
    merged.aggressiveMode = false;
  }

  return merged;
}

function definedOnly<T extends Record<string, boolean>>(
  group: Partial<T> | undefined,
): Partial<T> {
  const result: Partial<T> = {};
  if (!group) {
    return result;
  }

  for (const key in group) {
    const value = group[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

function collectViolations(settings: PolicySettings): string[] {
  const violations: string[] = [];

  if (settings.baseDelayMs > settings.maxDelayMs) {
    violations.push(
      `baseDelay (${settings.baseDelayMs}ms) exceeds maxDelay (${settings.maxDelayMs}ms)`,
    );
  }
  if (settings.minDelayMs > settings.maxDelayMs) {
    violations.push(
      `minDelay (${settings.minDelayMs}ms) exceeds maxDelay (${settings.maxDelayMs}ms)`,
    );
  }
  if (settings.circuitBreaker.failureThreshold < 1) {
    violations.push('circuitBreaker.failureThreshold must be at least 1');
  }
  if (
    settings.successRateThreshold < 0 ||
    settings.successRateThreshold > 1
  ) {
    violations.push(
      `successRateThreshold (${settings.successRateThreshold}) must be within [0, 1]`,
    );
  }
  if (
    settings.randomLongDelay.probability < 0 ||
    settings.randomLongDelay.probability > 1
  ) {
    violations.push(
      `randomLongDelay.probability (${settings.randomLongDelay.probability}) must be within [0, 1]`,
    );
  }
  if (settings.randomLongDelay.minMs > settings.randomLongDelay.maxMs) {
    violations.push('randomLongDelay.min exceeds randomLongDelay.max');
  }
  if (settings.maxRequestsPerSession < 1) {
    violations.push('maxRequestsPerSession must be at least 1');
  }
  if (settings.maxRequestsPerMinute < 1) {
    violations.push('maxRequestsPerMinute must be at least 1');
  }
  if (settings.maxRequestsPerHour !== undefined && settings.maxRequestsPerHour < 1) {
    violations.push('maxRequestsPerHour must be at least 1 when set');
  }
  if (settings.sessionRenewalJitterMs > settings.maxSessionDurationMs) {
    violations.push('sessionRenewalJitter exceeds maxSessionDuration');
  }

  // overlayPolicy clears the opposite flag, so both being set means one layer asked for both
  if (settings.aggressiveMode && settings.stealthMode) {
    violations.push('aggressiveMode and stealthMode cannot both be enabled');
  }

  return violations;
}

function freezePolicy(domain: string, settings: PolicySettings): Policy {
  return Object.freeze({
    ...settings,
    domain,
    randomLongDelay: Object.freeze({ ...settings.randomLongDelay }),
    circuitBreaker: Object.freeze({ ...settings.circuitBreaker }),
    security: Object.freeze({ ...settings.security }),
    evasion: Object.freeze({ ...settings.evasion }),
  });
}

/**
 * Turns the global default plus the site-override table into one frozen
 * policy per domain. Resolution is pure, so results are memoized.
 */
export class PolicyResolver {
  private readonly defaults: PolicySettings;
  private readonly sites: ReadonlyMap<string, PolicyOverride>;
  private readonly cache: Map<string, Policy>;

  constructor(config: Pick<GovernorConfig, 'defaults' | 'sites'>) {
    this.defaults = config.defaults;
    this.sites = new Map(
      Object.entries(config.sites).map(([domain, override]) => [
        normalizeDomain(domain),
        override,
      ]),
    );
    this.cache = new Map();
  }

  resolve(domain: string): Policy {
    const key = normalizeDomain(domain);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const override = this.sites.get(key);
    const settings = override
      ? overlayPolicy(this.defaults, override)
      : this.defaults;

    const violations = collectViolations(settings);
    if (violations.length > 0) {
      log.error(`Rejected policy for ${key}`, { violations });
      throw new PolicyViolationError(key, violations);
    }

    const policy = freezePolicy(key, settings);
    this.cache.set(key, policy);
    log.debug(`Resolved policy for ${key}`, { override: Boolean(override) });

    return policy;
  }

  configuredDomains(): string[] {
    return [...this.sites.keys()];
  }

  /**
   * Resolves the default and every configured site so a bad override fails at
   * startup instead of on the first request to that site.
   */
  validateAll(): void {
    const violations: string[] = [];

    for (const domain of ['', ...this.configuredDomains()]) {
      try {
        this.resolve(domain);
      } catch (error) {
        if (!(error instanceof PolicyViolationError)) {
          throw error;
        }
        violations.push(
          ...error.violations.map(
            (violation) => `${domain || '<default>'}: ${violation}`,
          ),
        );
      }
    }

    if (violations.length > 0) {
      throw new PolicyViolationError('*', violations);
    }
  }
}

export { overlayPolicy, collectViolations };
