import { IllegalTransitionError, type TerminalTurnState, type TurnState } from '../domain/index.js';

/**
 * Turn pipeline state machine. Rejects any transition not listed here.
 * Every non-terminal state may fail; only RECEIVED..INTENT_DETECTED may
 * be cancelled.
 */
const VALID_TRANSITIONS: Record<TurnState, readonly TurnState[]> = {
  RECEIVED: ['INPUT_VALIDATED', 'FAILED'],
  INPUT_VALIDATED: ['INTENT_DETECTED', 'FAILED'],
  INTENT_DETECTED: ['CONTEXT_UPDATED', 'FAILED'],
  CONTEXT_UPDATED: ['RESPONSE_GENERATED', 'FAILED'],
  RESPONSE_GENERATED: ['OUTPUT_VALIDATED', 'FAILED'],
  OUTPUT_VALIDATED: ['PUBLISHED', 'FAILED'],
  PUBLISHED: ['COMPLETE', 'DEGRADED', 'FAILED'],
  COMPLETE: [],   // terminal
  DEGRADED: [],   // terminal
  FAILED: [],     // terminal
};

const CANCELLABLE_STATES: readonly TurnState[] = ['RECEIVED', 'INPUT_VALIDATED', 'INTENT_DETECTED'];

export function validateTransition(current: TurnState, next: TurnState): boolean {
  return VALID_TRANSITIONS[current].includes(next);
}

export function assertTransition(current: TurnState, next: TurnState): void {
  if (!validateTransition(current, next)) {
    throw new IllegalTransitionError(
      `Invalid turn transition: ${current} → ${next}. ` +
      `Allowed from ${current}: [${VALID_TRANSITIONS[current].join(', ')}]`,
    );
  }
}

export function isTerminal(state: TurnState): state is TerminalTurnState {
  return VALID_TRANSITIONS[state].length === 0;
}

export function isCancellable(state: TurnState): boolean {
  return CANCELLABLE_STATES.includes(state);
}
