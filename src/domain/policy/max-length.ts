import type { PolicyDirection, PolicyViolation, Validator } from './types.js';

const RULE = 'length_exceeded';

/**
 * Length ceiling for one or more directions.
 *
 * Register one instance per direction when input and output
 * limits differ.
 */
export function createMaxLengthValidator(
  maxLength: number,
  directions: readonly PolicyDirection[] = ['input', 'output'],
): Validator {
  return {
    name: `${RULE}:${directions.join('+')}`,
    directions,

    validate(text: string): PolicyViolation[] {
      if (text.length <= maxLength) return [];

      return [{
        rule: RULE,
        detail: { current: text.length, max: maxLength },
      }];
    },
  };
}
