import type { Logger } from 'pino';
import type {
  PolicyContext,
  PolicyDirection,
  PolicyResult,
  Validator,
  ViolationDetail,
} from '../domain/index.js';

/**
 * Policy engine: runs the validator chain over a piece of text.
 *
 * 1. Validators run in registration order, skipping those that do not
 *    declare the requested direction.
 * 2. Every applicable validator runs; there is no short-circuit.
 * 3. Violations are merged by rule name. When two validators report the
 *    same rule the earlier one's detail is kept.
 */
export class PolicyEngine {
  private readonly validators: Validator[] = [];
  private readonly log: Logger;

  constructor(log: Logger, validators: readonly Validator[] = []) {
    this.log = log;
    for (const validator of validators) {
      this.addValidator(validator);
    }
  }

  addValidator(validator: Validator): void {
    this.validators.push(validator);
  }

  get validatorNames(): string[] {
    return this.validators.map((v) => v.name);
  }

  evaluate(text: string, direction: PolicyDirection, context: PolicyContext = {}): PolicyResult {
    const merged = new Map<string, ViolationDetail>();

    for (const validator of this.validators) {
      if (!validator.directions.includes(direction)) continue;

      for (const violation of validator.validate(text, direction, context)) {
        if (!merged.has(violation.rule)) {
          merged.set(violation.rule, violation.detail);
        }
      }
    }

    const passed = merged.size === 0;

    this.log.debug(
      { direction, passed, validators: this.validators.length, sessionId: context.sessionId },
      'Policy evaluated',
    );

    if (!passed) {
      this.log.warn(
        { direction, rules: [...merged.keys()], sessionId: context.sessionId },
        'Policy violation',
      );
    }

    return { passed, violations: Object.fromEntries(merged) };
  }
}
