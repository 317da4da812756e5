import {
  DEFAULT_BLOCKED_TERMS,
  createCharsetValidator,
  createContentFilterValidator,
  createMaxLengthValidator,
  createPathTraversalValidator,
  createRateLimitValidator,
  createSqlInjectionValidator,
  createXssValidator,
  type Validator,
} from '../../domain/index.js';

export interface PolicySettings {
  inputMaxLength: number;
  outputMaxLength: number;
  rateLimitMax: number;
  rateLimitWindowSeconds: number;
  strictCharset: boolean;
  blockedTerms?: readonly string[] | undefined;
}

/**
 * The standard validator chain, in evaluation order.
 *
 * Injection checks first, then length and content, then the optional
 * charset check, then rate limiting (which counts every input it sees).
 */
export function buildDefaultValidators(settings: PolicySettings, nowFn: () => number = Date.now): Validator[] {
  const validators: Validator[] = [
    createSqlInjectionValidator(),
    createXssValidator(),
    createPathTraversalValidator(),
    createMaxLengthValidator(settings.inputMaxLength, ['input']),
    createMaxLengthValidator(settings.outputMaxLength, ['output']),
    createContentFilterValidator(settings.blockedTerms ?? DEFAULT_BLOCKED_TERMS),
  ];

  if (settings.strictCharset) {
    validators.push(createCharsetValidator());
  }

  validators.push(createRateLimitValidator(settings.rateLimitMax, settings.rateLimitWindowSeconds, nowFn));
  return validators;
}
