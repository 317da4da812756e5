import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { eventDraftSchema } from '../../application/event-schema.js';
import {
  EventBusClosedError,
  EventValidationError,
  UnregisteredTopicError,
  isValidTopic,
  type BusEvent,
  type EventDraft,
  type EventPayload,
} from '../../domain/index.js';
import { SubscriberQueue, type EventHandler } from './subscriber-queue.js';

export interface EventBusOptions {
  log: Logger;
  nowFn?: () => Date;
  idFn?: () => string;
}

export interface TopicStats {
  topic: string;
  publishers: string[];
  subscribers: { name: string; pending: number; delivered: number; failed: number }[];
}

export interface BusStats {
  closed: boolean;
  published: number;
  topics: TopicStats[];
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * In-process topic-based publish/subscribe.
 *
 * - A topic must have a registered publisher before anything is
 *   published on it.
 * - Every subscription gets its own FIFO queue and worker; handlers of
 *   one subscription never block another's.
 * - `publish` enqueues and returns; delivery happens on a later microtask.
 * - Published events are deep-frozen copies of the draft.
 */
export class EventBus {
  private readonly log: Logger;
  private readonly nowFn: () => Date;
  private readonly idFn: () => string;
  private readonly publishersByTopic: Map<string, Set<string>> = new Map();
  private readonly subscriptions: Map<string, SubscriberQueue[]> = new Map();
  private published = 0;
  private closed = false;

  constructor(options: EventBusOptions) {
    this.log = options.log;
    this.nowFn = options.nowFn ?? (() => new Date());
    this.idFn = options.idFn ?? randomUUID;
  }

  /** Declares that `name` may publish on each of `topics`. */
  registerPublisher(name: string, topics: readonly string[]): void {
    if (name.trim() === '') {
      throw new EventValidationError('Publisher name cannot be empty');
    }
    for (const topic of topics) {
      if (!isValidTopic(topic)) {
        throw new EventValidationError(`Invalid topic "${topic}"`);
      }
      const names = this.publishersByTopic.get(topic) ?? new Set<string>();
      names.add(name);
      this.publishersByTopic.set(topic, names);
    }
    this.log.debug({ publisher: name, topics }, 'Publisher registered');
  }

  hasPublisher(topic: string): boolean {
    return (this.publishersByTopic.get(topic)?.size ?? 0) > 0;
  }

  /**
   * Adds a subscription and returns a function that removes it.
   * Subscribing to a topic nobody publishes yet is allowed.
   */
  subscribe(topic: string, handler: EventHandler, name: string = handler.name || 'anonymous'): () => void {
    if (!isValidTopic(topic)) {
      throw new EventValidationError(`Invalid topic "${topic}"`);
    }

    const queue = new SubscriberQueue(topic, name, handler, this.log);
    const queues = this.subscriptions.get(topic) ?? [];
    queues.push(queue);
    this.subscriptions.set(topic, queues);
    this.log.debug({ topic, subscriber: name }, 'Subscribed');

    return () => {
      this.remove(topic, queue);
    };
  }

  /** Removes every subscription of `handler` on `topic`. */
  unsubscribe(topic: string, handler: EventHandler): boolean {
    const queues = this.subscriptions.get(topic) ?? [];
    const matching = queues.filter((q) => q.handler === handler);
    for (const queue of matching) this.remove(topic, queue);
    return matching.length > 0;
  }

  /**
   * Validates, freezes and enqueues an event for every subscriber of its
   * topic. Returns the published event.
   *
   * @throws UnregisteredTopicError when the topic is missing or has no publisher
   * @throws EventValidationError when the draft is malformed
   * @throws EventBusClosedError after `close()`
   */
  publish<P extends EventPayload>(draft: EventDraft<P>): BusEvent<P> {
    if (this.closed) throw new EventBusClosedError();
    if (!draft.topic) throw new UnregisteredTopicError('');
    if (!this.hasPublisher(draft.topic)) throw new UnregisteredTopicError(draft.topic);

    const parsed = eventDraftSchema.safeParse(draft);
    if (!parsed.success) {
      throw new EventValidationError(
        `Invalid event for topic "${draft.topic}": ${parsed.error.issues.map((i) => i.message).join('; ')}`,
      );
    }

    let payload: P;
    try {
      payload = structuredClone(draft.payload);
    } catch (err: unknown) {
      throw new EventValidationError(`Payload for topic "${draft.topic}" is not serializable`, { cause: err });
    }

    const event: BusEvent<P> = deepFreeze({
      id: this.idFn(),
      topic: draft.topic,
      payload,
      createdAt: this.nowFn().toISOString(),
      source: draft.source,
      correlationId: draft.correlationId ?? null,
    });

    const queues = this.subscriptions.get(event.topic) ?? [];
    for (const queue of queues) queue.enqueue(event);
    this.published++;

    this.log.debug(
      { topic: event.topic, eventId: event.id, source: event.source, subscribers: queues.length },
      'Event published',
    );
    return event;
  }

  /**
   * Resolves when every queue is drained, including events published by
   * handlers while draining.
   */
  async idle(): Promise<void> {
    for (;;) {
      const queues = this.allQueues();
      if (queues.every((q) => q.isIdle)) return;
      await Promise.all(queues.map((q) => q.idle()));
    }
  }

  /** Rejects further publishes, drains what is queued, then drops all subscriptions. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.idle();
    for (const queue of this.allQueues()) queue.close();
    this.subscriptions.clear();
    this.log.info({ published: this.published }, 'Event bus closed');
  }

  get isClosed(): boolean {
    return this.closed;
  }

  stats(): BusStats {
    const topics = new Set([...this.publishersByTopic.keys(), ...this.subscriptions.keys()]);
    return {
      closed: this.closed,
      published: this.published,
      topics: [...topics].sort().map((topic) => ({
        topic,
        publishers: [...(this.publishersByTopic.get(topic) ?? [])].sort(),
        subscribers: (this.subscriptions.get(topic) ?? []).map((q) => {
          const { name, pending, delivered, failed } = q.stats();
          return { name, pending, delivered, failed };
        }),
      })),
    };
  }

  private remove(topic: string, queue: SubscriberQueue): void {
    const queues = this.subscriptions.get(topic);
    if (queues === undefined) return;

    const index = queues.indexOf(queue);
    if (index < 0) return;

    queues.splice(index, 1);
    queue.close();
    if (queues.length === 0) this.subscriptions.delete(topic);
  }

  private allQueues(): SubscriberQueue[] {
    return [...this.subscriptions.values()].flat();
  }
}
