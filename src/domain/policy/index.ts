export type {
  PolicyDirection,
  PolicyContext,
  PolicyResult,
  PolicyViolation,
  PolicyViolations,
  ViolationDetail,
  Validator,
} from './types.js';
export { createSqlInjectionValidator } from './sql-injection.js';
export { createXssValidator } from './xss.js';
export { createPathTraversalValidator } from './path-traversal.js';
export { createMaxLengthValidator } from './max-length.js';
export { createContentFilterValidator, DEFAULT_BLOCKED_TERMS } from './content-filter.js';
export { createCharsetValidator } from './charset.js';
export { createRateLimitValidator } from './rate-limit.js';
export type { RateLimitValidator } from './rate-limit.js';
