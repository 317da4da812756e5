import type { ConversationTurn } from './turn.js';

/** Slot values used by response generation (last-mentioned entity, last variant, ...). */
export type ContextSlots = Record<string, unknown>;

/**
 * Per-session conversation state.
 *
 * `turns` is bounded and ordered oldest → newest. `lastSequenceNumber`
 * survives eviction so numbering stays gap-free.
 */
export interface SessionContext {
  readonly sessionId: string;
  readonly turns: readonly ConversationTurn[];
  readonly slots: Readonly<ContextSlots>;
  readonly lastSequenceNumber: number;
  readonly hydrated: boolean;
  readonly createdAt: string; // ISO-8601
  readonly lastActiveAt: string; // ISO-8601
}
