import type { PolicyViolation, Validator } from './types.js';

const RULE = 'sql_injection';

/**
 * SQL fragments that have no business in a chat message.
 *
 * Matches statements rather than bare keywords so that
 * "please update my reminder" stays allowed.
 */
const SQL_PATTERNS: readonly RegExp[] = [
  /'\s*;/,
  /;\s*--/,
  /\b(drop|truncate|alter|create)\s+(table|database|schema|index|view)\b/i,
  /\bdelete\s+from\b/i,
  /\binsert\s+into\b/i,
  /\bupdate\s+\w+\s+set\b/i,
  /\bunion\s+(all\s+)?select\b/i,
  /'\s*(or|and)\s+'[^']*'\s*=\s*'/i,
  /'\s*(or|and)\s+\d+\s*=\s*\d+/i,
  /\/\*.*?\*\//,
];

/**
 * SQL injection detection.
 *
 * Reports the first matching pattern only; one violation per text.
 */
export function createSqlInjectionValidator(
  patterns: readonly RegExp[] = SQL_PATTERNS,
): Validator {
  return {
    name: RULE,
    directions: ['input'],

    validate(text: string): PolicyViolation[] {
      const hit = patterns.find((pattern) => pattern.test(text));
      if (hit === undefined) return [];

      return [{
        rule: RULE,
        detail: { pattern: hit.source, message: 'SQL injection attempt detected' },
      }];
    },
  };
}
