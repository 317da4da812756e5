import type { Logger } from 'pino';
import type { BusEvent } from '../../domain/index.js';

export type EventHandler = (event: BusEvent) => void | Promise<void>;

/**
 * One subscription: a FIFO of pending events drained by a single worker.
 *
 * Handlers run strictly one at a time per subscription, so a slow handler
 * only delays its own queue. Handler errors are logged and the event is
 * dropped; there is no retry at this level.
 */
export class SubscriberQueue {
  readonly topic: string;
  readonly name: string;
  readonly handler: EventHandler;
  private readonly log: Logger;
  private readonly pending: BusEvent[] = [];
  private draining = false;
  private closed = false;
  private waiters: Array<() => void> = [];
  private delivered = 0;
  private failed = 0;

  constructor(topic: string, name: string, handler: EventHandler, log: Logger) {
    this.topic = topic;
    this.name = name;
    this.handler = handler;
    this.log = log;
  }

  enqueue(event: BusEvent): void {
    if (this.closed) return;

    this.pending.push(event);
    if (!this.draining) {
      this.draining = true;
      // Deferred: publish returns before any handler runs.
      queueMicrotask(() => void this.drain());
    }
  }

  /** Resolves once the queue is empty and no handler is running. */
  idle(): Promise<void> {
    if (this.isIdle) return Promise.resolve();
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  get isIdle(): boolean {
    return !this.draining && this.pending.length === 0;
  }

  /** Stops delivery; events still queued are discarded. */
  close(): void {
    this.closed = true;
    this.pending.length = 0;
    if (!this.draining) this.notifyIdle();
  }

  stats(): { topic: string; name: string; pending: number; delivered: number; failed: number } {
    return {
      topic: this.topic,
      name: this.name,
      pending: this.pending.length,
      delivered: this.delivered,
      failed: this.failed,
    };
  }

  private async drain(): Promise<void> {
    let event = this.pending.shift();
    while (event !== undefined && !this.closed) {
      try {
        await this.handler(event);
        this.delivered++;
      } catch (err: unknown) {
        this.failed++;
        this.log.error(
          { err, topic: event.topic, eventId: event.id, subscriber: this.name },
          'Event handler failed',
        );
      }
      event = this.pending.shift();
    }

    this.draining = false;
    this.notifyIdle();
  }

  private notifyIdle(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}
