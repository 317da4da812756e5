import { describe, it, expect } from 'vitest';
import {
  assertTransition,
  isCancellable,
  isTerminal,
  validateTransition,
} from '../../src/application/turn-state.js';
import { IllegalTransitionError, type TurnState } from '../../src/domain/index.js';

const PIPELINE: TurnState[] = [
  'RECEIVED',
  'INPUT_VALIDATED',
  'INTENT_DETECTED',
  'CONTEXT_UPDATED',
  'RESPONSE_GENERATED',
  'OUTPUT_VALIDATED',
  'PUBLISHED',
  'COMPLETE',
];

describe('turn state machine', () => {
  it('allows the happy path in order', () => {
    for (let i = 0; i < PIPELINE.length - 1; i++) {
      const from = PIPELINE[i];
      const to = PIPELINE[i + 1];
      if (from === undefined || to === undefined) throw new Error('bad fixture');
      expect(validateTransition(from, to)).toBe(true);
    }
  });

  it('allows DEGRADED only from PUBLISHED', () => {
    expect(validateTransition('PUBLISHED', 'DEGRADED')).toBe(true);
    expect(validateTransition('OUTPUT_VALIDATED', 'DEGRADED')).toBe(false);
  });

  it('allows FAILED from every non-terminal state', () => {
    for (const state of PIPELINE.slice(0, -1)) {
      expect(validateTransition(state, 'FAILED')).toBe(true);
    }
  });

  it('rejects skipping a stage', () => {
    expect(() => assertTransition('RECEIVED', 'INTENT_DETECTED')).toThrow(IllegalTransitionError);
  });

  it('rejects leaving a terminal state', () => {
    expect(() => assertTransition('COMPLETE', 'FAILED')).toThrow(
      'Invalid turn transition: COMPLETE → FAILED. Allowed from COMPLETE: []',
    );
  });

  it('knows terminal and cancellable states', () => {
    const terminal: TurnState[] = ['COMPLETE', 'DEGRADED', 'FAILED'];
    expect(terminal.every(isTerminal)).toBe(true);
    expect(isTerminal('PUBLISHED')).toBe(false);
    expect(isCancellable('INTENT_DETECTED')).toBe(true);
    expect(isCancellable('CONTEXT_UPDATED')).toBe(false);
  });
});
