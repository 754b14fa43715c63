import type { EmergencyConfig, PolicySettings } from './types.js';

const SECOND = 1000;
const MINUTE = 60 * SECOND;

const DEFAULT_POLICY_SETTINGS: PolicySettings = {
  maxRequestsPerSession: 100,
  maxSessionDurationMs: 60 * MINUTE,
  sessionRenewalJitterMs: 5 * MINUTE,
  cookiePersistence: true,
  sessionFingerprintRotation: true,

  baseDelayMs: 2 * SECOND,
  maxDelayMs: 10 * SECOND,
  delayJitterMs: 3 * SECOND,
  minDelayMs: 0,
  burstProtection: true,
  maxRequestsPerMinute: 6,
  maxRequestsPerHour: undefined,
  humanLikePatterns: true,
  randomLongDelay: {
    enabled: true,
    probability: 0.1,
    minMs: 10 * SECOND,
    maxMs: 30 * SECOND,
  },

  maxFailedRequests: 5,
  successRateThreshold: 0.8,
  retryAttempts: 3,
  exponentialBackoff: true,
  circuitBreaker: {
    enabled: true,
    failureThreshold: 5,
    recoveryTimeoutMs: 60 * SECOND,
  },

  aggressiveMode: false,
  stealthMode: true,
  requiresJavaScript: false,
  requiresLogin: false,

  security: {
    enableProxyRotation: false,
    enableProfileRotation: true,
    enableCaptchaSolving: true,
    enableCloudflareBypass: false,
    enableJavascriptRendering: false,
  },
  evasion: {
    randomizeHeaders: true,
    randomizeTlsFingerprint: true,
    simulateHumanBehavior: true,
    headerOrderRandomization: true,
    tcpFingerprintRandomization: false,
  },
};

const DEFAULT_BAN_INDICATORS = [
  'access denied',
  'you have been blocked',
  'your ip has been banned',
  'suspicious activity',
  'checking your browser',
  'security check',
] as const;

const DEFAULT_EMERGENCY_CONFIG: EmergencyConfig = {
  ipBan: {
    enabled: true,
    indicators: DEFAULT_BAN_INDICATORS,
    response: 'switch_proxy_and_delay',
  },
  captchaFlood: {
    enabled: true,
    threshold: 3,
    response: 'long_delay_and_profile_change',
    minDelayMs: 30 * SECOND,
    maxDelayMs: 120 * SECOND,
  },
  rateLimit: {
    enabled: true,
    respectRetryAfter: true,
    defaultBackoffMs: 60 * SECOND,
  },
};

export { DEFAULT_POLICY_SETTINGS, DEFAULT_EMERGENCY_CONFIG, DEFAULT_BAN_INDICATORS };
