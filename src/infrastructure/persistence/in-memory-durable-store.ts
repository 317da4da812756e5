import type { BusEvent, ConversationTurn } from '../../domain/index.js';
import { toSystemEventRecord, type DurableStore, type PersistResult, type SystemEventRecord } from './durable-store.js';

/**
 * Durable store kept in process memory.
 *
 * Used when no DATABASE_URL is configured, and by tests. Same idempotency
 * rules as the Postgres store; contents are lost on restart.
 */
export class InMemoryDurableStore implements DurableStore {
  readonly kind = 'memory';
  private readonly turns: Map<string, Map<number, ConversationTurn>> = new Map();
  private readonly events: Map<string, SystemEventRecord> = new Map();

  async persist(turn: ConversationTurn): Promise<PersistResult> {
    const session = this.turns.get(turn.sessionId) ?? new Map<number, ConversationTurn>();
    this.turns.set(turn.sessionId, session);

    if (session.has(turn.sequenceNumber)) return { ok: true, inserted: false };
    session.set(turn.sequenceNumber, turn);
    return { ok: true, inserted: true };
  }

  async query(sessionId: string, limit: number): Promise<ConversationTurn[]> {
    const session = this.turns.get(sessionId);
    if (session === undefined) return [];
    return [...session.values()]
      .sort((a, b) => b.sequenceNumber - a.sequenceNumber)
      .slice(0, Math.max(0, limit));
  }

  async recordEvent(event: BusEvent): Promise<PersistResult> {
    if (this.events.has(event.id)) return { ok: true, inserted: false };
    this.events.set(event.id, toSystemEventRecord(event));
    return { ok: true, inserted: true };
  }

  async queryEvents(topic: string, limit: number): Promise<SystemEventRecord[]> {
    return [...this.events.values()]
      .filter((e) => e.topic === topic)
      .reverse()
      .slice(0, Math.max(0, limit));
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.turns.clear();
    this.events.clear();
  }

  /** For testing: total turns stored across all sessions. */
  get turnCount(): number {
    let total = 0;
    for (const session of this.turns.values()) total += session.size;
    return total;
  }
}
