import type { Policy } from '../config/types.js';

type ThreatLevel = 'low' | 'medium' | 'high' | 'critical';

type ThreatThreshold = {
  level: Exclude<ThreatLevel, 'low'>;
  /** Success rate strictly below this reaches the level. */
  successBelow: number;
  /** Detection rate strictly above this reaches the level. */
  detectionAbove: number;
};

const THREAT_THRESHOLDS: readonly ThreatThreshold[] = [
  { level: 'critical', successBelow: 0.5, detectionAbove: 0.5 },
  { level: 'high', successBelow: 0.7, detectionAbove: 0.3 },
  { level: 'medium', successBelow: 0.85, detectionAbove: 0.15 },
];

/**
 * How hard a domain is pushing back, from its recent success rate and the
 * share of responses that carried a detection signal.
 */
export function assessThreatLevel(successRate: number, detectionRate: number): ThreatLevel {
  const match = THREAT_THRESHOLDS.find(
    (threshold) =>
      successRate < threshold.successBelow || detectionRate > threshold.detectionAbove,
  );
  return match?.level ?? 'low';
}

type ThreatResponse = {
  stealth: boolean;
  /** Cap on requests per session at this level. */
  maxRequestsPerSession: number;
  /** Extra pause added on top of the paced delay, [min, max] ms. */
  extraDelayMs?: readonly [number, number];
};

const THREAT_RESPONSES: Readonly<Record<Exclude<ThreatLevel, 'low'>, ThreatResponse>> = {
  medium: { stealth: true, maxRequestsPerSession: 15 },
  high: { stealth: true, maxRequestsPerSession: 5, extraDelayMs: [2_000, 8_000] },
  critical: { stealth: true, maxRequestsPerSession: 3, extraDelayMs: [5_000, 15_000] },
};

/**
 * The policy to pace a domain with at `level`: from medium up the stealth
 * bias is forced on and sessions are shortened. `low` returns `policy` as is.
 */
export function escalatePolicy(policy: Policy, level: ThreatLevel): Policy {
  if (level === 'low') {
    return policy;
  }

  const response = THREAT_RESPONSES[level];
  return Object.freeze({
    ...policy,
    stealthMode: response.stealth,
    aggressiveMode: false,
    maxRequestsPerSession: Math.min(policy.maxRequestsPerSession, response.maxRequestsPerSession),
  });
}

export function threatExtraDelay(level: ThreatLevel): readonly [number, number] | undefined {
  return level === 'low' ? undefined : THREAT_RESPONSES[level].extraDelayMs;
}

export type { ThreatLevel };
