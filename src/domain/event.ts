/**
 * Core domain types for bus events.
 *
 * These types define the canonical shape of an event as it travels
 * between components. They carry no framework dependencies.
 */

/** Free-form key/value payload attached to every event. */
export type EventPayload = Record<string, unknown>;

/**
 * Canonical bus event.
 *
 * `id` and `createdAt` are assigned by the bus at publish time.
 * Once published the object (payload included) is frozen.
 */
export interface BusEvent<P extends EventPayload = EventPayload> {
  readonly id: string;
  readonly topic: string;
  readonly payload: P;
  readonly createdAt: string; // ISO-8601
  readonly source: string;
  readonly correlationId: string | null;
}

/** What a publisher hands to the bus. */
export interface EventDraft<P extends EventPayload = EventPayload> {
  readonly topic: string;
  readonly payload: P;
  readonly source: string;
  readonly correlationId?: string | null;
}

/** Well-known topics emitted by the core. */
export const TOPICS = {
  conversationTurn: 'conversation.turn',
  conversationTurnFailed: 'conversation.turn_failed',
  sessionEnded: 'session.ended',
  systemStart: 'system.start',
  systemShutdown: 'system.shutdown',
} as const;

export type KnownTopic = (typeof TOPICS)[keyof typeof TOPICS];

const TOPIC_RE = /^[a-z][a-z0-9_]*(\.[a-z][a-z0-9_]*)+$/;

/** Topics are dot-namespaced, lower-case, at least two segments. */
export function isValidTopic(topic: string): boolean {
  return TOPIC_RE.test(topic);
}
