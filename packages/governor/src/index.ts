export {
  RequestGovernor,
  createGovernor,
  type GovernorOptions,
  type CreateGovernorOptions,
  type AcquireOptions,
  type Sleeper
} from './orchestrator/request-governor.js'
export { DomainLock } from './orchestrator/domain-lock.js'
export type {
  Admission,
  Rejection,
  AdmitResult,
  ReportResult,
  DomainStats
} from './orchestrator/types.js'

export {
  parseGovernorConfig,
  loadGovernorConfig,
  loadGovernorConfigFromEnv
} from './config/loader.js'
export { PolicyResolver, overlayPolicy, collectViolations } from './config/policy-resolver.js'
export { DEFAULT_POLICY_SETTINGS, DEFAULT_EMERGENCY_CONFIG } from './config/defaults.js'
export { EMERGENCY_RESPONSES } from './config/types.js'
export type {
  Policy,
  PolicySettings,
  PolicyOverride,
  GovernorConfig,
  EmergencyConfig,
  EmergencyResponse
} from './config/types.js'

export { Session } from './session/session.js'
export { SessionManager } from './session/session-manager.js'
export { UserAgentIdentityPool } from './session/identity-pool.js'
export type {
  Fingerprint,
  IdentityPool,
  RotationReason,
  SessionInfo,
  SessionState
} from './session/types.js'

export { PacingEngine } from './anti-blocking/pacing-engine.js'
export { RequestLog } from './anti-blocking/request-log.js'
export { RetryStrategy } from './anti-blocking/retry-strategy.js'
export { BanDetector } from './anti-blocking/ban-detector.js'
export { EmergencyProtocol, type EmergencyOutcome } from './anti-blocking/emergency-protocol.js'
export type {
  PacingDecision,
  PacingReason,
  ResponseSignal,
  RequestOutcome,
  EmergencyAction,
  EmergencyEvent,
  EmergencyKind,
  FailureKind,
  RetryDecision
} from './anti-blocking/types.js'

export { FailureWindow } from './health/failure-window.js'
export { CircuitBreaker, type CircuitState } from './health/circuit-breaker.js'
export { FailureMonitor, type HealthSnapshot } from './health/failure-monitor.js'

export { GovernedHttpClient, type GovernedResponse, type GetOptions } from './http/governed-client.js'
export { toResponseSignal, parseRetryAfter } from './http/response-signal.js'
export { CaptchaDetector, type CaptchaKind } from './http/captcha-detector.js'

export { GovernorMetrics, type MetricSnapshot } from './observability/metrics.js'
export { assessThreatLevel, escalatePolicy, threatExtraDelay, type ThreatLevel } from './observability/threat-level.js'

export {
  GovernorError,
  PolicyViolationError,
  CircuitOpenError,
  RetryExhaustedError,
  ConfigValidationError,
  isGovernorError,
  type GovernorErrorCode
} from './errors.js'

export { ManualClock, systemClock, type Clock } from './utils/clock.js'
export { createSeededRandom, systemRandom, type RandomSource } from './utils/random.js'
export { normalizeDomain } from './utils/domain.js'
