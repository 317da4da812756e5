import type { PolicyViolation, Validator } from './types.js';

const RULE = 'xss_attempt';

const XSS_PATTERNS: readonly RegExp[] = [
  /<script\b[^>]*>[\s\S]*?<\/script>/i,
  /javascript:/i,
  /<[^>]+\son[a-z]+\s*=/i,
  /<iframe\b/i,
  /<object\b/i,
  /<embed\b/i,
];

/** Cross-site scripting markup in user text. */
export function createXssValidator(
  patterns: readonly RegExp[] = XSS_PATTERNS,
): Validator {
  return {
    name: RULE,
    directions: ['input'],

    validate(text: string): PolicyViolation[] {
      const hit = patterns.find((pattern) => pattern.test(text));
      if (hit === undefined) return [];

      return [{
        rule: RULE,
        detail: { pattern: hit.source, message: 'Cross-site scripting attempt detected' },
      }];
    },
  };
}
