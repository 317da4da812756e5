import { desc, eq } from 'drizzle-orm';
import { StorageError, type BusEvent, type ConversationTurn } from '../../domain/index.js';
import type { DurableStore, PersistResult, SystemEventRecord } from '../persistence/durable-store.js';
import type { Database, SqlClient } from './client.js';
import { conversationTurns, systemEvents, type ConversationTurnRow, type SystemEventRow } from './schema.js';

function rowToTurn(row: ConversationTurnRow): ConversationTurn {
  return {
    turnId: row.turn_id,
    sessionId: row.session_id,
    sequenceNumber: row.sequence_number,
    userInput: row.user_input,
    detectedIntent: row.detected_intent,
    assistantResponse: row.assistant_response,
    status: row.status,
    createdAt: row.created_at.toISOString(),
    processingDurationMs: row.processing_duration_ms,
    metadata: row.metadata,
  };
}

function rowToEvent(row: SystemEventRow): SystemEventRecord {
  return {
    eventId: row.event_id,
    topic: row.topic,
    source: row.source,
    correlationId: row.correlation_id,
    payload: row.payload,
    createdAt: row.created_at.toISOString(),
  };
}

/**
 * PostgreSQL-backed durable store (drizzle-orm over postgres.js).
 *
 * Inserts use ON CONFLICT DO NOTHING; `RETURNING` tells a fresh insert
 * from a duplicate.
 */
export class DrizzleDurableStore implements DurableStore {
  readonly kind = 'postgres';
  private readonly db: Database;
  private readonly sql: SqlClient;

  constructor(db: Database, sql: SqlClient) {
    this.db = db;
    this.sql = sql;
  }

  async persist(turn: ConversationTurn): Promise<PersistResult> {
    try {
      const rows = await this.db
        .insert(conversationTurns)
        .values({
          turn_id: turn.turnId,
          session_id: turn.sessionId,
          sequence_number: turn.sequenceNumber,
          user_input: turn.userInput,
          detected_intent: turn.detectedIntent,
          assistant_response: turn.assistantResponse,
          status: turn.status,
          processing_duration_ms: turn.processingDurationMs,
          metadata: { ...turn.metadata },
          created_at: new Date(turn.createdAt),
        })
        .onConflictDoNothing({ target: [conversationTurns.session_id, conversationTurns.sequence_number] })
        .returning({ turn_id: conversationTurns.turn_id });

      return { ok: true, inserted: rows.length > 0 };
    } catch (err: unknown) {
      return { ok: false, error: new StorageError(`Failed to persist turn ${turn.turnId}`, { cause: err }) };
    }
  }

  async query(sessionId: string, limit: number): Promise<ConversationTurn[]> {
    try {
      const rows = await this.db
        .select()
        .from(conversationTurns)
        .where(eq(conversationTurns.session_id, sessionId))
        .orderBy(desc(conversationTurns.sequence_number))
        .limit(limit);
      return rows.map(rowToTurn);
    } catch (err: unknown) {
      throw new StorageError(`Failed to query turns for session ${sessionId}`, { cause: err });
    }
  }

  async recordEvent(event: BusEvent): Promise<PersistResult> {
    try {
      const rows = await this.db
        .insert(systemEvents)
        .values({
          event_id: event.id,
          topic: event.topic,
          source: event.source,
          correlation_id: event.correlationId,
          payload: { ...event.payload },
          created_at: new Date(event.createdAt),
        })
        .onConflictDoNothing({ target: systemEvents.event_id })
        .returning({ event_id: systemEvents.event_id });

      return { ok: true, inserted: rows.length > 0 };
    } catch (err: unknown) {
      return { ok: false, error: new StorageError(`Failed to record event ${event.id}`, { cause: err }) };
    }
  }

  async queryEvents(topic: string, limit: number): Promise<SystemEventRecord[]> {
    try {
      const rows = await this.db
        .select()
        .from(systemEvents)
        .where(eq(systemEvents.topic, topic))
        .orderBy(desc(systemEvents.created_at))
        .limit(limit);
      return rows.map(rowToEvent);
    } catch (err: unknown) {
      throw new StorageError(`Failed to query events for topic ${topic}`, { cause: err });
    }
  }

  /** Rejects with the driver error when the server is unreachable. */
  async ping(): Promise<boolean> {
    await this.sql`SELECT 1`;
    return true;
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 });
  }
}
