import type {
  EmergencyEvent,
  PacingReason,
  RetryDecision,
} from '../anti-blocking/types.js';
import type { Policy } from '../config/types.js';
import type { CircuitState } from '../health/circuit-breaker.js';
import type { ThreatLevel } from '../observability/threat-level.js';
import type { Session } from '../session/session.js';
import type { RotationReason, SessionInfo } from '../session/types.js';

type Admission = {
  admitted: true;
  domain: string;
  session: Session;
  /** The domain's policy, escalated for its current threat level. */
  policy: Policy;
  waitMs: number;
  sendAt: number;
  pacing: PacingReason;
  /** This request is the half-open circuit's trial; report it with `trial: true`. */
  trial: boolean;
  /** Set when admitting this request replaced the session. */
  rotation: RotationReason | undefined;
};

type Rejection = {
  admitted: false;
  domain: string;
  reason: 'circuit-open';
  retryAt: number;
};

type AdmitResult = Admission | Rejection;

type ReportResult = {
  domain: string;
  /** The outcome as recorded: a detected emergency or CAPTCHA counts as a failure. */
  success: boolean;
  decision: RetryDecision;
  event: EmergencyEvent | undefined;
  /** Take the next proxy before retrying. */
  switchProxy: boolean;
  /** The session subsequent requests will use. */
  session: Session;
  healthy: boolean;
  circuit: CircuitState;
  consecutiveFailures: number;
  successRate: number;
};

type DomainStats = {
  domain: string;
  session: SessionInfo | undefined;
  rotations: number;
  recentSends: number;
  successRate: number;
  detectionRate: number;
  consecutiveFailures: number;
  captchaSightings: number;
  samples: number;
  healthy: boolean;
  circuit: CircuitState;
  circuitRetryAt: number | undefined;
  emergencyUntil: number | undefined;
  threatLevel: ThreatLevel;
};

export type { Admission, Rejection, AdmitResult, ReportResult, DomainStats };
