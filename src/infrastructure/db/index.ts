export { conversationTurns, systemEvents } from './schema.js';
export type { ConversationTurnRow, SystemEventRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, DbClientOptions, SqlClient } from './client.js';
export { ensureSchema } from './migrate.js';
export { DrizzleDurableStore } from './drizzle-durable-store.js';
