import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { createLogger } from '@workspace/logger';
import type { ZodIssue } from 'zod';
import { ConfigValidationError } from '../errors.js';
import { normalizeDomain } from '../utils/domain.js';
import {
  DEFAULT_EMERGENCY_CONFIG,
  DEFAULT_POLICY_SETTINGS,
} from './defaults.js';
import { overlayPolicy } from './policy-resolver.js';
import {
  governorConfigSchema,
  type EmergencyProtocolsDocument,
  type GovernorConfigDocument,
  type SiteOverrideDocument,
} from './schema.js';
import type { EmergencyConfig, GovernorConfig, PolicyOverride } from './types.js';

const log = createLogger('Config');

const toMs = (seconds: number | undefined): number | undefined =>
  seconds === undefined ? undefined : Math.round(seconds * 1000);

function toPolicyOverride(fields: SiteOverrideDocument): PolicyOverride {
  const longDelays = fields.random_long_delays;
  const breaker = fields.circuit_breaker;

  return {
    maxRequestsPerSession: fields.max_requests_per_session,
    maxSessionDurationMs: toMs(fields.max_session_duration),
    sessionRenewalJitterMs: toMs(fields.session_renewal_jitter),
    cookiePersistence: fields.cookie_persistence,
    sessionFingerprintRotation: fields.session_fingerprint_rotation,

    baseDelayMs: toMs(fields.base_delay),
    maxDelayMs: toMs(fields.max_delay),
    delayJitterMs: toMs(fields.delay_jitter),
    minDelayMs: toMs(fields.min_delay),
    burstProtection: fields.burst_protection,
    maxRequestsPerMinute: fields.max_requests_per_minute,
    maxRequestsPerHour: fields.max_requests_per_hour,
    humanLikePatterns: fields.human_like_patterns,
    randomLongDelay: longDelays && {
      enabled: longDelays.enabled,
      probability: longDelays.probability,
      minMs: toMs(longDelays.min_delay),
      maxMs: toMs(longDelays.max_delay),
    },

    maxFailedRequests: fields.max_failed_requests,
    successRateThreshold: fields.success_rate_threshold,
    retryAttempts: fields.retry_attempts,
    exponentialBackoff: fields.exponential_backoff,
    circuitBreaker: breaker && {
      enabled: breaker.enabled,
      failureThreshold: breaker.failure_threshold,
      recoveryTimeoutMs: toMs(breaker.recovery_timeout),
    },

    aggressiveMode: fields.aggressive_mode,
    stealthMode: fields.stealth_mode,
    requiresJavaScript: fields.requires_javascript,
    requiresLogin: fields.requires_login,

    security: {
      enableProxyRotation: fields.enable_proxy_rotation,
      enableProfileRotation: fields.enable_profile_rotation,
      enableCaptchaSolving: fields.enable_captcha_solving,
      enableCloudflareBypass: fields.enable_cloudflare_bypass,
      enableJavascriptRendering: fields.enable_javascript_rendering,
    },
    evasion: {
      randomizeHeaders: fields.randomize_headers,
      randomizeTlsFingerprint: fields.randomize_tls_fingerprint,
      simulateHumanBehavior: fields.simulate_human_behavior,
      headerOrderRandomization: fields.header_order_randomization,
      tcpFingerprintRandomization: fields.tcp_fingerprint_randomization,
    },
  };
}

function toEmergencyConfig(
  document: EmergencyProtocolsDocument | undefined,
): EmergencyConfig {
  const defaults = DEFAULT_EMERGENCY_CONFIG;
  const ipBan = document?.ip_ban_detection;
  const captcha = document?.captcha_flood;
  const rateLimit = document?.rate_limit_detection;

  return {
    ipBan: {
      enabled: ipBan?.enabled ?? defaults.ipBan.enabled,
      indicators: ipBan?.indicators ?? defaults.ipBan.indicators,
      response: ipBan?.response ?? defaults.ipBan.response,
    },
    captchaFlood: {
      enabled: captcha?.enabled ?? defaults.captchaFlood.enabled,
      threshold: captcha?.threshold ?? defaults.captchaFlood.threshold,
      response: captcha?.response ?? defaults.captchaFlood.response,
      minDelayMs: toMs(captcha?.min_delay) ?? defaults.captchaFlood.minDelayMs,
      maxDelayMs: toMs(captcha?.max_delay) ?? defaults.captchaFlood.maxDelayMs,
    },
    rateLimit: {
      enabled: rateLimit?.enabled ?? defaults.rateLimit.enabled,
      respectRetryAfter:
        rateLimit?.respect_retry_after ?? defaults.rateLimit.respectRetryAfter,
      defaultBackoffMs:
        toMs(rateLimit?.default_backoff) ?? defaults.rateLimit.defaultBackoffMs,
    },
  };
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
  return `${path}: ${issue.message}`;
}

function buildConfig(document: GovernorConfigDocument): GovernorConfig {
  const globalFields: SiteOverrideDocument = {
    ...document.session_management,
    ...document.request_patterns,
    ...document.failure_handling,
    ...document.security_features,
    ...document.detection_evasion,
  };

  const sites: Record<string, PolicyOverride> = {};
  for (const [domain, fields] of Object.entries(document.site_specific ?? {})) {
    sites[normalizeDomain(domain)] = toPolicyOverride(fields);
  }

  const emergency = toEmergencyConfig(document.emergency_protocols);
  if (emergency.captchaFlood.minDelayMs > emergency.captchaFlood.maxDelayMs) {
    throw new ConfigValidationError('emergency_protocols', [
      'captcha_flood.min_delay exceeds captcha_flood.max_delay',
    ]);
  }

  return {
    defaults: overlayPolicy(DEFAULT_POLICY_SETTINGS, toPolicyOverride(globalFields)),
    sites,
    emergency,
  };
}

/**
 * Validates a configuration document (durations in seconds) and converts it
 * into the typed, millisecond-based `GovernorConfig`. Missing groups and fields
 * fall back to the built-in defaults.
 */
export function parseGovernorConfig(
  raw: unknown,
  source = 'inline',
): GovernorConfig {
  const parsed = governorConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigValidationError(source, parsed.error.issues.map(formatIssue));
  }

  const config = buildConfig(parsed.data);
  log.debug(`Loaded governor config from ${source}`, {
    sites: Object.keys(config.sites),
  });

  return config;
}

export function loadGovernorConfig(path: string): GovernorConfig {
  const absolutePath = resolve(path);
  if (!existsSync(absolutePath)) {
    throw new ConfigValidationError(absolutePath, ['file does not exist']);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new ConfigValidationError(absolutePath, [
      `not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  return parseGovernorConfig(raw, absolutePath);
}

/**
 * Reads the file named by `GOVERNOR_CONFIG`, or returns the built-in defaults.
 */
export function loadGovernorConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): GovernorConfig {
  const path = env.GOVERNOR_CONFIG?.trim();
  if (!path) {
    log.info('GOVERNOR_CONFIG not set, using built-in defaults');
    return parseGovernorConfig({}, 'defaults');
  }

  return loadGovernorConfig(path);
}
