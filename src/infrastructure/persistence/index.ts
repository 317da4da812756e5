export { toSystemEventRecord } from './durable-store.js';
export type { DurableStore, PersistResult, SystemEventRecord } from './durable-store.js';
export { InMemoryDurableStore } from './in-memory-durable-store.js';
export { startTurnPersister, persistWithRetry } from './turn-persister.js';
export type { PersistRetryOptions } from './turn-persister.js';
export { startSystemEventRecorder, RECORDED_TOPICS } from './system-event-recorder.js';
