type RandomLongDelay = {
  enabled: boolean;
  /** Chance per pacing decision that the long pause replaces the normal delay. */
  probability: number;
  minMs: number;
  maxMs: number;
};

type CircuitBreakerPolicy = {
  enabled: boolean;
  failureThreshold: number;
  recoveryTimeoutMs: number;
};

type SecurityFeatures = {
  enableProxyRotation: boolean;
  enableProfileRotation: boolean;
  enableCaptchaSolving: boolean;
  enableCloudflareBypass: boolean;
  enableJavascriptRendering: boolean;
};

type DetectionEvasion = {
  randomizeHeaders: boolean;
  randomizeTlsFingerprint: boolean;
  simulateHumanBehavior: boolean;
  headerOrderRandomization: boolean;
  tcpFingerprintRandomization: boolean;
};

/**
 * Every tunable limit, without the domain it applies to.
 */
type PolicySettings = {
  maxRequestsPerSession: number;
  maxSessionDurationMs: number;
  sessionRenewalJitterMs: number;
  cookiePersistence: boolean;
  sessionFingerprintRotation: boolean;

  baseDelayMs: number;
  maxDelayMs: number;
  delayJitterMs: number;
  minDelayMs: number;
  burstProtection: boolean;
  maxRequestsPerMinute: number;
  maxRequestsPerHour: number | undefined;
  humanLikePatterns: boolean;
  randomLongDelay: RandomLongDelay;

  maxFailedRequests: number;
  successRateThreshold: number;
  retryAttempts: number;
  exponentialBackoff: boolean;
  circuitBreaker: CircuitBreakerPolicy;

  aggressiveMode: boolean;
  stealthMode: boolean;
  requiresJavaScript: boolean;
  requiresLogin: boolean;

  security: SecurityFeatures;
  evasion: DetectionEvasion;
};

/**
 * Resolved, frozen limits for one domain.
 */
type Policy = Readonly<
  Omit<PolicySettings, 'randomLongDelay' | 'circuitBreaker' | 'security' | 'evasion'> & {
    domain: string;
    randomLongDelay: Readonly<RandomLongDelay>;
    circuitBreaker: Readonly<CircuitBreakerPolicy>;
    security: Readonly<SecurityFeatures>;
    evasion: Readonly<DetectionEvasion>;
  }
>;

type NestedGroup = 'randomLongDelay' | 'circuitBreaker' | 'security' | 'evasion';

/**
 * A site override: any subset of the settings, nested groups included.
 */
type PolicyOverride = Partial<Omit<PolicySettings, NestedGroup>> & {
  randomLongDelay?: Partial<RandomLongDelay>;
  circuitBreaker?: Partial<CircuitBreakerPolicy>;
  security?: Partial<SecurityFeatures>;
  evasion?: Partial<DetectionEvasion>;
};

const EMERGENCY_RESPONSES = [
  'switch_proxy_and_delay',
  'long_delay_and_profile_change',
  'backoff',
] as const;

type EmergencyResponse = (typeof EMERGENCY_RESPONSES)[number];

type EmergencyConfig = {
  ipBan: {
    enabled: boolean;
    indicators: readonly string[];
    response: EmergencyResponse;
  };
  captchaFlood: {
    enabled: boolean;
    threshold: number;
    response: EmergencyResponse;
    minDelayMs: number;
    maxDelayMs: number;
  };
  rateLimit: {
    enabled: boolean;
    respectRetryAfter: boolean;
    defaultBackoffMs: number;
  };
};

type GovernorConfig = {
  defaults: PolicySettings;
  /** Keyed by normalized domain. */
  sites: Readonly<Record<string, PolicyOverride>>;
  emergency: EmergencyConfig;
};

export type {
  RandomLongDelay,
  CircuitBreakerPolicy,
  SecurityFeatures,
  DetectionEvasion,
  PolicySettings,
  Policy,
  PolicyOverride,
  EmergencyResponse,
  EmergencyConfig,
  GovernorConfig,
};
export { EMERGENCY_RESPONSES };
