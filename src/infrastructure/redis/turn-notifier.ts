import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { TOPICS, type BusEvent } from '../../domain/index.js';
import type { EventBus } from '../bus/index.js';

export const TURN_CHANNEL = 'conversation_turns';

/** Anything that can PUBLISH; an ioredis client in production. */
export type RedisPublisher = Pick<Redis, 'publish'>;

/**
 * Mirrors `conversation.turn` events to the "conversation_turns" Pub/Sub
 * channel as JSON, for consumers outside the process.
 *
 * Best-effort: publish failures are logged and never affect the turn.
 * Returns the unsubscribe function.
 */
export function startTurnNotifier(bus: EventBus, redis: RedisPublisher, log: Logger): () => void {
  return bus.subscribe(
    TOPICS.conversationTurn,
    (event: BusEvent) => publishTurnNotification(redis, log, event),
    'turn_notifier',
  );
}

export async function publishTurnNotification(redis: RedisPublisher, log: Logger, event: BusEvent): Promise<void> {
  try {
    await redis.publish(TURN_CHANNEL, JSON.stringify(event));
    log.debug({ channel: TURN_CHANNEL, eventId: event.id, correlationId: event.correlationId }, 'Published turn notification');
  } catch (err: unknown) {
    log.warn({ err, eventId: event.id }, 'Failed to publish turn notification');
  }
}
