export { EventBus, SubscriberQueue } from './bus/index.js';
export type { BusStats, EventBusOptions, EventHandler, TopicStats } from './bus/index.js';
export {
  InMemoryDurableStore,
  startTurnPersister,
  persistWithRetry,
  startSystemEventRecorder,
  RECORDED_TOPICS,
  toSystemEventRecord,
} from './persistence/index.js';
export type { DurableStore, PersistResult, PersistRetryOptions, SystemEventRecord } from './persistence/index.js';
export { createDbClient, ensureSchema, DrizzleDurableStore, conversationTurns, systemEvents } from './db/index.js';
export type { Database, SqlClient } from './db/index.js';
export { connectRedis, startTurnNotifier, publishTurnNotification, TURN_CHANNEL } from './redis/index.js';
export type { RedisPublisher } from './redis/index.js';
export { OllamaBackend } from './backend/index.js';
export type { OllamaBackendOptions } from './backend/index.js';
export { loadIntentCatalog, loadResponseCatalog, parseIntentCatalog, parseResponseCatalog } from './catalog/index.js';
export { buildDefaultValidators } from './policy/index.js';
export type { PolicySettings } from './policy/index.js';
