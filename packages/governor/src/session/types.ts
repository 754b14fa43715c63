type SessionState = 'active' | 'expiring' | 'retired';

type RotationReason =
  | 'initial'
  | 'request-limit'
  | 'max-age'
  | 'unhealthy'
  | 'ip-ban'
  | 'captcha-flood'
  | 'rate-limited'
  | 'manual';

/**
 * Externally visible identity of a session. The seeds are opaque to the
 * governor; the HTTP layer uses them to pick header order and TLS profile.
 */
type Fingerprint = {
  userAgent: string;
  headerOrderSeed: number;
  tlsProfileSeed: number;
};

interface IdentityPool {
  nextFingerprint(): Fingerprint;
}

type SessionInfo = {
  id: string;
  domain: string;
  state: SessionState;
  requestCount: number;
  createdAt: number;
  fingerprint: Fingerprint;
  cookieJar: string;
  reason: RotationReason;
};

export type {
  SessionState,
  RotationReason,
  Fingerprint,
  IdentityPool,
  SessionInfo,
};
