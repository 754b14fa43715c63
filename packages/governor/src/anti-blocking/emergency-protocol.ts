import { createLogger } from '@workspace/logger';
import type { Policy } from '../config/types.js';
import type { GovernorMetrics } from '../observability/metrics.js';
import type { Session } from '../session/session.js';
import type { SessionManager } from '../session/session-manager.js';
import type { RotationReason } from '../session/types.js';
import type { PacingEngine } from './pacing-engine.js';
import type { EmergencyAction, EmergencyEvent, EmergencyKind } from './types.js';

const log = createLogger('EmergencyProtocol');

type EmergencyOutcome = {
  event: EmergencyEvent;
  /** The replacement session, when the action rotated one. */
  rotated: Session | undefined;
  /** The caller should take the next proxy from its pool. */
  switchProxy: boolean;
  waitUntil: number;
};

type EmergencyProtocolDeps = {
  sessions: SessionManager;
  pacing: PacingEngine;
  metrics: GovernorMetrics;
};

const ROTATION_REASON: Record<EmergencyKind, RotationReason> = {
  'ip-ban': 'ip-ban',
  'captcha-flood': 'captcha-flood',
  'rate-limited': 'rate-limited',
};

function assertNever(action: never): never {
  throw new Error(`Unhandled emergency action: ${JSON.stringify(action)}`);
}

/**
 * Carries out the action attached to an emergency event. The session that saw
 * the event is rotated only while it is still the domain's current one, so
 * concurrent requests sharing it rotate once.
 */
export class EmergencyProtocol {
  private readonly deps: EmergencyProtocolDeps;

  constructor(deps: EmergencyProtocolDeps) {
    this.deps = deps;
  }

  apply(event: EmergencyEvent, policy: Policy, session?: Session): EmergencyOutcome {
    const { pacing, metrics } = this.deps;
    const action: EmergencyAction = event.action;

    let rotated: Session | undefined;
    let switchProxy = false;

    switch (action.type) {
      case 'switch_proxy_and_delay':
        rotated = this.rotate(event, policy, session);
        switchProxy = rotated !== undefined && policy.security.enableProxyRotation;
        break;
      case 'long_delay_and_profile_change':
        rotated = this.rotate(event, policy, session);
        break;
      case 'backoff':
        break;
      default:
        return assertNever(action);
    }

    pacing.noteEmergencyDelay(event.domain, event.kind, action.delayMs, event.detectedAt);
    metrics.increment(`emergency.${event.kind}`);

    const waitUntil = event.detectedAt + action.delayMs;
    log.warn(`Applied ${action.type} to ${event.domain}`, {
      kind: event.kind,
      delayMs: action.delayMs,
      rotated: rotated?.id,
      switchProxy,
    });

    return { event, rotated, switchProxy, waitUntil };
  }

  private rotate(event: EmergencyEvent, policy: Policy, session?: Session): Session | undefined {
    const { sessions, metrics } = this.deps;
    if (session && !sessions.isCurrent(event.domain, session)) {
      log.debug(`Session ${session.id} already replaced on ${event.domain}`, { kind: event.kind });
      return undefined;
    }

    const replacement = sessions.rotate(event.domain, policy, ROTATION_REASON[event.kind]);
    metrics.increment('session.rotated');
    return replacement;
  }
}

export type { EmergencyOutcome, EmergencyProtocolDeps };
