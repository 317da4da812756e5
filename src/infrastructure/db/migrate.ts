import type { Logger } from 'pino';
import type { SqlClient } from './client.js';

/**
 * Creates tables and indexes if missing (lightweight migration via raw SQL).
 *
 * drizzle-kit can generate proper migrations from schema.ts; this keeps a
 * fresh database usable on first start.
 */
export async function ensureSchema(sql: SqlClient, log: Logger): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS conversation_turns (
      turn_id                 UUID PRIMARY KEY,
      session_id              VARCHAR(128)     NOT NULL,
      sequence_number         INTEGER          NOT NULL,
      user_input              TEXT             NOT NULL,
      detected_intent         JSONB,
      assistant_response      TEXT             NOT NULL,
      status                  VARCHAR(20)      NOT NULL,
      processing_duration_ms  DOUBLE PRECISION NOT NULL,
      metadata                JSONB            NOT NULL DEFAULT '{}',
      created_at              TIMESTAMPTZ      NOT NULL,
      CONSTRAINT uq_turns_session_sequence UNIQUE (session_id, sequence_number)
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS system_events (
      event_id        UUID PRIMARY KEY,
      topic           VARCHAR(255) NOT NULL,
      source          VARCHAR(255) NOT NULL,
      correlation_id  VARCHAR(255),
      payload         JSONB        NOT NULL DEFAULT '{}',
      created_at      TIMESTAMPTZ  NOT NULL
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_turns_created_at ON conversation_turns (created_at)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_system_events_topic ON system_events (topic)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_system_events_created_at ON system_events (created_at)`);

  log.info('Database ready (conversation_turns + system_events tables)');
}
