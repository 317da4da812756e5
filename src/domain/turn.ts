import type { Intent } from './intent.js';
import type { PolicyDirection, PolicyViolations } from './policy/types.js';

/** Free-form metadata attached to a turn by the caller. */
export type TurnMetadata = Record<string, unknown>;

/** Pipeline states. A turn's state names the stage it is executing. */
export type TurnState =
  | 'RECEIVED'
  | 'INPUT_VALIDATED'
  | 'INTENT_DETECTED'
  | 'CONTEXT_UPDATED'
  | 'RESPONSE_GENERATED'
  | 'OUTPUT_VALIDATED'
  | 'PUBLISHED'
  | 'COMPLETE'
  | 'DEGRADED'
  | 'FAILED';

export type TerminalTurnState = Extract<TurnState, 'COMPLETE' | 'DEGRADED' | 'FAILED'>;

/** Status reported to the caller. */
export type TurnStatus = TerminalTurnState;

/** Status of a turn that made it into the context and the durable store. */
export type CommittedTurnStatus = Exclude<TurnStatus, 'FAILED'>;

/**
 * One completed request/response exchange.
 *
 * Created once per completed pipeline run and never updated afterwards.
 */
export interface ConversationTurn {
  readonly turnId: string;
  readonly sessionId: string;
  readonly sequenceNumber: number;
  readonly userInput: string;
  readonly detectedIntent: Intent | null;
  readonly assistantResponse: string;
  readonly status: CommittedTurnStatus;
  readonly createdAt: string; // ISO-8601
  readonly processingDurationMs: number;
  readonly metadata: Readonly<TurnMetadata>;
}

/** Why a turn completed with a substituted response. */
export type DegradedReason = 'generation_failed' | 'output_policy';

/** Typed failure carried by a FAILED outcome. */
export type TurnError =
  | { readonly kind: 'PolicyViolation'; readonly direction: PolicyDirection; readonly message: string }
  | { readonly kind: 'SystemError'; readonly stage: TurnState; readonly message: string }
  | { readonly kind: 'Timeout'; readonly stage: TurnState; readonly message: string; readonly systemError: true }
  | { readonly kind: 'Cancelled'; readonly stage: TurnState; readonly message: string };

export type TurnErrorKind = TurnError['kind'];

/** What `submitTurn` resolves to. */
export interface TurnOutcome {
  readonly turnId: string;
  readonly sessionId: string;
  readonly status: TurnStatus;
  readonly state: TerminalTurnState;
  readonly responseText: string;
  readonly intent: Intent | null;
  readonly sequenceNumber: number | null;
  readonly violations?: PolicyViolations;
  readonly error?: TurnError;
  readonly degradedReason?: DegradedReason;
  readonly processingDurationMs: number;
}

/** Answer to a cancellation request. */
export type CancelResult =
  | { readonly ok: true; readonly turnId: string; readonly state: TurnState }
  | { readonly ok: false; readonly error: 'CancellationRejected'; readonly turnId: string; readonly state: TurnState }
  | { readonly ok: false; readonly error: 'NotFound'; readonly turnId: string };

/** Fixed user-facing texts. None of them leak internals. */
export const RESPONSES = {
  denial: "I'm sorry, but I can't help with that request.",
  apology: "I'm sorry, something went wrong on my side. Please try again.",
  safeFallback: "I'm sorry, I don't have a good answer for that right now.",
} as const;
