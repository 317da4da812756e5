import type { Logger } from 'pino';
import { turnEventPayloadSchema } from '../../application/event-schema.js';
import { TOPICS, type BusEvent, type ConversationTurn } from '../../domain/index.js';
import type { EventBus } from '../bus/index.js';
import type { DurableStore } from './durable-store.js';

export interface PersistRetryOptions {
  maxAttempts?: number;
  /** Base delay; attempt n waits n × retryDelayMs before retrying. */
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Subscribes the durable store to `conversation.turn`.
 *
 * Each committed turn is validated and written with bounded retries.
 * Returns the unsubscribe function.
 */
export function startTurnPersister(
  bus: EventBus,
  store: DurableStore,
  log: Logger,
  options: PersistRetryOptions = {},
): () => void {
  return bus.subscribe(
    TOPICS.conversationTurn,
    async (event: BusEvent) => {
      const parsed = turnEventPayloadSchema.safeParse(event.payload);
      if (!parsed.success) {
        log.warn({ eventId: event.id, issues: parsed.error.issues }, 'Malformed conversation.turn payload, skipping');
        return;
      }
      await persistWithRetry(store, parsed.data, log, options);
    },
    'turn_persister',
  );
}

/**
 * Writes a turn, retrying failed attempts with linear backoff.
 *
 * Resolves true once the store acknowledges the turn (inserted or
 * already present), false after the last attempt fails. Never rejects.
 *
 * Exported for unit testing; callers outside this module should use
 * `startTurnPersister()` instead.
 */
export async function persistWithRetry(
  store: DurableStore,
  turn: ConversationTurn,
  log: Logger,
  options: PersistRetryOptions = {},
): Promise<boolean> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const retryDelayMs = options.retryDelayMs ?? 200;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let failure: unknown;
    try {
      const result = await store.persist(turn);
      if (result.ok) {
        log.debug(
          { turnId: turn.turnId, sessionId: turn.sessionId, sequenceNumber: turn.sequenceNumber, inserted: result.inserted },
          result.inserted ? 'Turn persisted' : 'Turn already persisted (duplicate)',
        );
        return true;
      }
      failure = result.error;
    } catch (err: unknown) {
      failure = err;
    }

    if (attempt < maxAttempts) {
      log.warn({ err: failure, turnId: turn.turnId, attempt, maxAttempts }, 'Turn persistence failed, retrying');
      await sleep(retryDelayMs * attempt);
    } else {
      log.error({ err: failure, turnId: turn.turnId, attempts: maxAttempts }, 'Giving up persisting turn');
    }
  }
  return false;
}
