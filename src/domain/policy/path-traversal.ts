import type { PolicyViolation, Validator } from './types.js';

const RULE = 'path_traversal';

const TRAVERSAL_PATTERNS: readonly RegExp[] = [
  /\.\.\//,
  /\.\.\\/,
];

export function createPathTraversalValidator(): Validator {
  return {
    name: RULE,
    directions: ['input'],

    validate(text: string): PolicyViolation[] {
      const hit = TRAVERSAL_PATTERNS.find((pattern) => pattern.test(text));
      if (hit === undefined) return [];

      return [{
        rule: RULE,
        detail: { pattern: hit.source, message: 'Path traversal attempt detected' },
      }];
    },
  };
}
