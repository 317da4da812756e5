import { describe, it, expect } from 'vitest';
import {
  createCharsetValidator,
  createContentFilterValidator,
  createMaxLengthValidator,
  createPathTraversalValidator,
  createRateLimitValidator,
  createSqlInjectionValidator,
  createXssValidator,
} from '../../src/domain/index.js';

// ── SQL injection ────────────────────────────────────────

describe('createSqlInjectionValidator', () => {
  const validator = createSqlInjectionValidator();

  it('flags a quote-terminated statement', () => {
    const violations = validator.validate("'; DROP TABLE users;--", 'input', {});
    expect(violations).toEqual([{
      rule: 'sql_injection',
      detail: { pattern: "'\\s*;", message: 'SQL injection attempt detected' },
    }]);
  });

  it('flags UNION SELECT', () => {
    const [violation] = validator.validate('1 union select password from accounts', 'input', {});
    expect(violation?.detail['pattern']).toBe('\\bunion\\s+(all\\s+)?select\\b');
  });

  it('flags a quoted tautology', () => {
    const [violation] = validator.validate("admin' or 'a'='a", 'input', {});
    expect(violation?.detail['pattern']).toBe("'\\s*(or|and)\\s+'[^']*'\\s*=\\s*'");
  });

  it('allows quoted alternatives in ordinary chat', () => {
    expect(validator.validate("say 'yes' or 'no'", 'input', {})).toEqual([]);
  });

  it('allows everyday words that happen to be SQL keywords', () => {
    expect(validator.validate('please update my reminder and select a song', 'input', {})).toEqual([]);
  });

  it('only applies to input', () => {
    expect(validator.directions).toEqual(['input']);
  });
});

// ── XSS / path traversal ─────────────────────────────────

describe('createXssValidator', () => {
  const validator = createXssValidator();

  it('flags script tags', () => {
    const [violation] = validator.validate('<script>alert(1)</script>', 'input', {});
    expect(violation?.rule).toBe('xss_attempt');
  });

  it('flags inline event handlers', () => {
    const [violation] = validator.validate('<img src=x onerror=alert(1)>', 'input', {});
    expect(violation?.detail['pattern']).toBe('<[^>]+\\son[a-z]+\\s*=');
  });

  it('allows a plain comparison', () => {
    expect(validator.validate('is 3 < 4?', 'input', {})).toEqual([]);
  });
});

describe('createPathTraversalValidator', () => {
  const validator = createPathTraversalValidator();

  it('flags ../ sequences', () => {
    const [violation] = validator.validate('read ../../etc/passwd', 'input', {});
    expect(violation?.rule).toBe('path_traversal');
  });

  it('allows an ellipsis', () => {
    expect(validator.validate('well... ok', 'input', {})).toEqual([]);
  });
});

// ── Length / content / charset ───────────────────────────

describe('createMaxLengthValidator', () => {
  it('accepts text at the limit', () => {
    expect(createMaxLengthValidator(5).validate('abcde', 'input', {})).toEqual([]);
  });

  it('reports current and max length above the limit', () => {
    expect(createMaxLengthValidator(5).validate('abcdef', 'output', {})).toEqual([{
      rule: 'length_exceeded',
      detail: { current: 6, max: 5 },
    }]);
  });

  it('names each instance after its directions', () => {
    expect(createMaxLengthValidator(5, ['output']).name).toBe('length_exceeded:output');
    expect(createMaxLengthValidator(5).name).toBe('length_exceeded:input+output');
  });
});

describe('createContentFilterValidator', () => {
  const validator = createContentFilterValidator(['darn', 'heck']);

  it('lists every matched term in list order', () => {
    expect(validator.validate('Heck, that darn thing', 'input', {})).toEqual([{
      rule: 'blocked_content',
      detail: { terms: ['darn', 'heck'], message: 'Text contains blocked terms' },
    }]);
  });

  it('matches whole words only', () => {
    expect(validator.validate('darning socks', 'input', {})).toEqual([]);
  });

  it('ignores blank terms', () => {
    expect(createContentFilterValidator(['  ', '']).validate('anything', 'output', {})).toEqual([]);
  });
});

describe('createCharsetValidator', () => {
  const validator = createCharsetValidator();

  it('accepts ASCII text with punctuation', () => {
    expect(validator.validate("What's the time? (now)", 'input', {})).toEqual([]);
  });

  it('reports each invalid character once', () => {
    const [violation] = validator.validate('café café ☃', 'input', {});
    expect(violation?.detail['characters']).toEqual(['é', '☃']);
  });
});

// ── Rate limit ───────────────────────────────────────────

describe('createRateLimitValidator', () => {
  it('allows up to max inputs per window and rejects the next', () => {
    let now = 1_000_000;
    const validator = createRateLimitValidator(2, 60, () => now);

    expect(validator.validate('a', 'input', { sessionId: 's1' })).toEqual([]);
    expect(validator.validate('b', 'input', { sessionId: 's1' })).toEqual([]);
    expect(validator.validate('c', 'input', { sessionId: 's1' })).toEqual([{
      rule: 'rate_limited',
      detail: { count: 3, max: 2, window_seconds: 60 },
    }]);

    now += 61_000;
    expect(validator.validate('d', 'input', { sessionId: 's1' })).toEqual([]);
  });

  it('stops tracking sessions whose inputs have aged out', () => {
    let now = 1_000_000;
    const validator = createRateLimitValidator(5, 60, () => now);
    for (const sessionId of ['s1', 's2', 's3']) {
      validator.validate('hi', 'input', { sessionId });
    }
    expect(validator.trackedSessions).toBe(3);

    now += 61_000;
    validator.validate('hi', 'input', { sessionId: 's4' });

    expect(validator.trackedSessions).toBe(1);
  });

  it('counts sessions separately', () => {
    const validator = createRateLimitValidator(1, 60, () => 0);
    expect(validator.validate('a', 'input', { sessionId: 's1' })).toEqual([]);
    expect(validator.validate('a', 'input', { sessionId: 's2' })).toEqual([]);
    expect(validator.validate('a', 'input', { sessionId: 's1' })).toHaveLength(1);
  });
});
