import type { PolicyViolation, Validator } from './types.js';

const RULE = 'invalid_characters';

const ALLOWED_CHAR = /[a-zA-Z0-9\s.,!?\-'"();:@#$%&*+=/[\]{}]/;

/**
 * Strict character set: ASCII letters, digits, whitespace and standard
 * punctuation. Off by default since it rejects accented letters.
 */
export function createCharsetValidator(): Validator {
  return {
    name: RULE,
    directions: ['input'],

    validate(text: string): PolicyViolation[] {
      const invalid: string[] = [];
      for (const char of text) {
        if (!ALLOWED_CHAR.test(char) && !invalid.includes(char)) {
          invalid.push(char);
        }
      }
      if (invalid.length === 0) return [];

      return [{
        rule: RULE,
        detail: { characters: invalid, message: 'Input contains invalid characters' },
      }];
    },
  };
}
