export type { BusEvent, EventDraft, EventPayload, KnownTopic } from './event.js';
export { TOPICS, isValidTopic } from './event.js';
export type { Intent, IntentEntities, MatchRule, IntentPatternGroup } from './intent.js';
export { FALLBACK_INTENT, FALLBACK_INTENT_NAME } from './intent.js';
export type {
  ConversationTurn,
  TurnMetadata,
  TurnState,
  TerminalTurnState,
  TurnStatus,
  CommittedTurnStatus,
  DegradedReason,
  TurnError,
  TurnErrorKind,
  TurnOutcome,
  CancelResult,
} from './turn.js';
export { RESPONSES } from './turn.js';
export type { SessionContext, ContextSlots } from './session.js';
export * from './errors.js';
export * from './policy/index.js';
