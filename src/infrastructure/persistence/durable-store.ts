import type { BusEvent, ConversationTurn, StorageError } from '../../domain/index.js';

/** Outcome of a write. `inserted: false` means the record already existed. */
export type PersistResult =
  | { readonly ok: true; readonly inserted: boolean }
  | { readonly ok: false; readonly error: StorageError };

/** A non-turn bus event as kept in the system event log. */
export interface SystemEventRecord {
  readonly eventId: string;
  readonly topic: string;
  readonly source: string;
  readonly correlationId: string | null;
  readonly payload: Readonly<Record<string, unknown>>;
  readonly createdAt: string; // ISO-8601
}

/**
 * Long-term storage for completed turns and system events.
 *
 * Writes are idempotent: a turn is keyed by (sessionId, sequenceNumber),
 * an event by its id. Write failures come back as `{ ok: false }`; read
 * failures throw StorageError.
 */
export interface DurableStore {
  readonly kind: string;
  persist(turn: ConversationTurn): Promise<PersistResult>;
  /** Most recent first, at most `limit` turns. */
  query(sessionId: string, limit: number): Promise<ConversationTurn[]>;
  recordEvent(event: BusEvent): Promise<PersistResult>;
  /** Most recent first, at most `limit` events. */
  queryEvents(topic: string, limit: number): Promise<SystemEventRecord[]>;
  /** Liveness check for the health route; may reject instead of resolving false. */
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export function toSystemEventRecord(event: BusEvent): SystemEventRecord {
  return {
    eventId: event.id,
    topic: event.topic,
    source: event.source,
    correlationId: event.correlationId,
    payload: event.payload,
    createdAt: event.createdAt,
  };
}
