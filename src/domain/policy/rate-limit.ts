import type { PolicyContext, PolicyViolation, Validator } from './types.js';

const RULE = 'rate_limited';
const ANONYMOUS = '<anonymous>';

export interface RateLimitValidator extends Validator {
  /** Sessions with at least one input inside the window as of the last sweep. */
  readonly trackedSessions: number;
}

/**
 * Sliding-window rate limit on input, keyed by session.
 *
 * Every evaluated input counts, rejected or not. This is the only
 * time-dependent validator; the clock is injectable for tests.
 * Once per window, sessions whose inputs have all aged out are dropped.
 */
export function createRateLimitValidator(
  maxTurns: number = 30,
  windowSeconds: number = 60,
  nowFn: () => number = Date.now,
): RateLimitValidator {
  const windowMs = windowSeconds * 1000;
  const windows = new Map<string, number[]>();
  let lastSweepAt = Number.NEGATIVE_INFINITY;

  const sweep = (now: number, cutoff: number): void => {
    if (now - lastSweepAt < windowMs) return;
    for (const [key, timestamps] of windows) {
      if ((timestamps.at(-1) ?? cutoff) <= cutoff) windows.delete(key);
    }
    lastSweepAt = now;
  };

  return {
    name: RULE,
    directions: ['input'],

    get trackedSessions(): number {
      return windows.size;
    },

    validate(_text: string, _direction, context: PolicyContext): PolicyViolation[] {
      const key = context.sessionId ?? ANONYMOUS;
      const now = nowFn();
      const cutoff = now - windowMs;
      sweep(now, cutoff);

      const recent = (windows.get(key) ?? []).filter((t) => t > cutoff);
      recent.push(now);
      windows.set(key, recent);

      if (recent.length <= maxTurns) return [];

      return [{
        rule: RULE,
        detail: { count: recent.length, max: maxTurns, window_seconds: windowSeconds },
      }];
    },
  };
}
