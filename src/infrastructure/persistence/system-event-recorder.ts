import type { Logger } from 'pino';
import { TOPICS, type BusEvent } from '../../domain/index.js';
import type { EventBus } from '../bus/index.js';
import type { DurableStore } from './durable-store.js';

export const RECORDED_TOPICS: readonly string[] = [
  TOPICS.conversationTurnFailed,
  TOPICS.sessionEnded,
  TOPICS.systemStart,
  TOPICS.systemShutdown,
];

/**
 * Appends non-turn events to the system event log. Single attempt;
 * failures are logged. Returns a function removing every subscription.
 */
export function startSystemEventRecorder(
  bus: EventBus,
  store: DurableStore,
  log: Logger,
  topics: readonly string[] = RECORDED_TOPICS,
): () => void {
  const record = async (event: BusEvent): Promise<void> => {
    const result = await store.recordEvent(event);
    if (!result.ok) {
      log.error({ err: result.error, eventId: event.id, topic: event.topic }, 'Failed to record system event');
    }
  };

  const unsubscribes = topics.map((topic) => bus.subscribe(topic, record, 'system_event_recorder'));
  return () => {
    for (const unsubscribe of unsubscribes) unsubscribe();
  };
}
