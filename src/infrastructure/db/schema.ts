import { pgTable, uuid, varchar, text, integer, doublePrecision, timestamp, jsonb, index, unique } from 'drizzle-orm/pg-core';
import type { CommittedTurnStatus, Intent, TurnMetadata } from '../../domain/index.js';

/**
 * Drizzle schema for the `conversation_turns` table.
 *
 * (session_id, sequence_number) is unique: re-delivered turns hit
 * ON CONFLICT DO NOTHING and leave exactly one row.
 */
export const conversationTurns = pgTable('conversation_turns', {
  turn_id: uuid('turn_id').primaryKey(),
  session_id: varchar('session_id', { length: 128 }).notNull(),
  sequence_number: integer('sequence_number').notNull(),
  user_input: text('user_input').notNull(),
  detected_intent: jsonb('detected_intent').$type<Intent | null>(),
  assistant_response: text('assistant_response').notNull(),
  status: varchar('status', { length: 20 }).$type<CommittedTurnStatus>().notNull(),
  processing_duration_ms: doublePrecision('processing_duration_ms').notNull(),
  metadata: jsonb('metadata').$type<TurnMetadata>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull(),
}, (table) => [
  unique('uq_turns_session_sequence').on(table.session_id, table.sequence_number),
  index('idx_turns_created_at').on(table.created_at),
]);

/**
 * Drizzle schema for the `system_events` table.
 *
 * Every bus event other than `conversation.turn`. `event_id` is the bus-assigned id.
 */
export const systemEvents = pgTable('system_events', {
  event_id: uuid('event_id').primaryKey(),
  topic: varchar('topic', { length: 255 }).notNull(),
  source: varchar('source', { length: 255 }).notNull(),
  correlation_id: varchar('correlation_id', { length: 255 }),
  payload: jsonb('payload').$type<Record<string, unknown>>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull(),
}, (table) => [
  index('idx_system_events_topic').on(table.topic),
  index('idx_system_events_created_at').on(table.created_at),
]);

export type ConversationTurnRow = typeof conversationTurns.$inferSelect;
export type SystemEventRow = typeof systemEvents.$inferSelect;
