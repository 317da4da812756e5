export { connectRedis } from './client.js';
export { startTurnNotifier, publishTurnNotification, TURN_CHANNEL } from './turn-notifier.js';
export type { RedisPublisher } from './turn-notifier.js';
