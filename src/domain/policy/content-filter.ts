import type { PolicyDirection, PolicyViolation, Validator } from './types.js';

const RULE = 'blocked_content';

export const DEFAULT_BLOCKED_TERMS: readonly string[] = [
  'damn',
  'hell',
  'stupid',
  'idiot',
  'hate',
  'kill',
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case-insensitive banned-term filter.
 *
 * Every matched term is listed in the detail, in list order.
 */
export function createContentFilterValidator(
  terms: readonly string[] = DEFAULT_BLOCKED_TERMS,
  directions: readonly PolicyDirection[] = ['input', 'output'],
): Validator {
  const matchers = terms
    .map((term) => term.trim())
    .filter((term) => term.length > 0)
    .map((term) => ({ term, re: new RegExp(`\\b${escapeRegExp(term)}\\b`, 'i') }));

  return {
    name: RULE,
    directions,

    validate(text: string): PolicyViolation[] {
      const matched = matchers.filter(({ re }) => re.test(text)).map(({ term }) => term);
      if (matched.length === 0) return [];

      return [{
        rule: RULE,
        detail: { terms: matched, message: 'Text contains blocked terms' },
      }];
    },
  };
}
