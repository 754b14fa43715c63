type GovernorErrorCode =
  | 'policy-violation'
  | 'circuit-open'
  | 'retry-exhausted'
  | 'config-invalid';

/**
 * Base for every error the governor raises. `code` is stable and safe to switch on.
 */
abstract class GovernorError extends Error {
  abstract readonly code: GovernorErrorCode;
  readonly domain: string | undefined;

  constructor(message: string, domain?: string) {
    super(message);
    this.name = new.target.name;
    this.domain = domain;
  }
}

/**
 * A resolved policy breaks one of its invariants (for example `baseDelay > maxDelay`).
 * Raised at resolution time; values are never clamped silently.
 */
class PolicyViolationError extends GovernorError {
  readonly code = 'policy-violation' as const;
  readonly violations: readonly string[];

  constructor(domain: string, violations: readonly string[]) {
    super(`Invalid policy for "${domain}": ${violations.join('; ')}`, domain);
    this.violations = violations;
  }
}

/**
 * The domain's circuit breaker is open. Callers must not retry before `retryAt`.
 */
class CircuitOpenError extends GovernorError {
  readonly code = 'circuit-open' as const;
  readonly retryAt: number;

  constructor(domain: string, retryAt: number) {
    super(
      `Circuit for "${domain}" is open until ${new Date(retryAt).toISOString()}`,
      domain,
    );
    this.retryAt = retryAt;
  }
}

class RetryExhaustedError extends GovernorError {
  readonly code = 'retry-exhausted' as const;
  readonly attempts: number;
  readonly lastFailure: string | undefined;

  constructor(domain: string, attempts: number, lastFailure?: string) {
    super(
      `Gave up on "${domain}" after ${attempts} attempt${attempts === 1 ? '' : 's'}` +
        (lastFailure ? `: ${lastFailure}` : ''),
      domain,
    );
    this.attempts = attempts;
    this.lastFailure = lastFailure;
  }
}

class ConfigValidationError extends GovernorError {
  readonly code = 'config-invalid' as const;
  readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[]) {
    super(`Invalid governor configuration (${source}):\n  - ${issues.join('\n  - ')}`);
    this.issues = issues;
  }
}

function isGovernorError(error: unknown): error is GovernorError {
  return error instanceof GovernorError;
}

export {
  GovernorError,
  PolicyViolationError,
  CircuitOpenError,
  RetryExhaustedError,
  ConfigValidationError,
  isGovernorError,
};
export type { GovernorErrorCode };
