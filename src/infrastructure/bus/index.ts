export { EventBus } from './event-bus.js';
export type { BusStats, EventBusOptions, TopicStats } from './event-bus.js';
export { SubscriberQueue } from './subscriber-queue.js';
export type { EventHandler } from './subscriber-queue.js';
