/** Which side of the exchange is being checked. */
export type PolicyDirection = 'input' | 'output';

/** Structured explanation attached to a violation. */
export type ViolationDetail = Readonly<Record<string, unknown>>;

/** Rule name → detail, aggregated across the whole validator chain. */
export type PolicyViolations = Record<string, ViolationDetail>;

/** A single problem reported by a validator. */
export interface PolicyViolation {
  readonly rule: string;
  readonly detail: ViolationDetail;
}

/**
 * Extra information some validators need.
 * Rate limiting keys on the session; content checks ignore it.
 */
export interface PolicyContext {
  readonly sessionId?: string | undefined;
}

/**
 * Result of evaluating the full chain.
 *
 * `passed === true` implies `violations` is empty.
 */
export interface PolicyResult {
  readonly passed: boolean;
  readonly violations: Readonly<PolicyViolations>;
}

/**
 * A validator checks one concern and returns zero or more violations.
 *
 * Validators must not throw for bad input; rejecting text is what the
 * returned violations are for. Apart from explicit rate limiters they
 * are deterministic.
 */
export interface Validator {
  readonly name: string;
  readonly directions: readonly PolicyDirection[];
  validate(text: string, direction: PolicyDirection, context: PolicyContext): PolicyViolation[];
}
