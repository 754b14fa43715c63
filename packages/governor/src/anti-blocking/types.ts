import type { EmergencyResponse } from '../config/types.js';

type PacingReason = 'jitter' | 'long-delay' | 'burst' | 'rate-limit' | 'emergency';

type PacingDecision = {
  /** Time to wait from `now` before sending. */
  delayMs: number;
  /** Reserved send time, epoch ms. */
  sendAt: number;
  /** The constraint that set `sendAt`. */
  reason: PacingReason;
};

/**
 * What the caller saw on the wire, reduced to what detection needs.
 * `status` is 0 when no response arrived.
 */
type ResponseSignal = {
  status: number;
  /** At most a couple of KiB of body text. */
  bodyExcerpt: string;
  retryAfterMs?: number;
  captchaDetected?: boolean;
  headers?: Readonly<Record<string, string>>;
};

type RequestOutcome = {
  success: boolean;
  /** Zero-based attempt index of the logical operation this request belongs to. */
  attempt?: number;
  error?: string;
  durationMs?: number;
  /** Set when the admission was the circuit's half-open trial. */
  trial?: boolean;
};

type EmergencyKind = 'ip-ban' | 'captcha-flood' | 'rate-limited';

type EmergencyAction =
  | { type: 'switch_proxy_and_delay'; delayMs: number }
  | { type: 'long_delay_and_profile_change'; delayMs: number }
  | { type: 'backoff'; delayMs: number };

type EmergencyEvent = {
  domain: string;
  kind: EmergencyKind;
  detectedAt: number;
  action: EmergencyAction;
};

type FailureKind =
  | 'blocked'
  | 'rate-limited'
  | 'captcha'
  | 'server'
  | 'network'
  | 'client';

type AbandonReason = 'client-error' | 'retry-exhausted' | 'circuit-open';

type RetryDecision =
  | { action: 'done' }
  | { action: 'retry-now'; failure: FailureKind; delayMs: 0 }
  | { action: 'retry-after-backoff'; failure: FailureKind; delayMs: number }
  | { action: 'abandon'; failure: FailureKind; reason: AbandonReason };

const toAction = (type: EmergencyResponse, delayMs: number): EmergencyAction => ({
  type,
  delayMs,
});

export type {
  PacingReason,
  PacingDecision,
  ResponseSignal,
  RequestOutcome,
  EmergencyKind,
  EmergencyAction,
  EmergencyEvent,
  FailureKind,
  AbandonReason,
  RetryDecision,
};
export { toAction };
