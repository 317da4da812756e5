import { Redis } from 'ioredis';
import type { Logger } from 'pino';

/**
 * Opens the ioredis connection used by the turn notifier.
 * Connects eagerly so a bad REDIS_URL fails at startup.
 */
export async function connectRedis(redisUrl: string, log: Logger): Promise<Redis> {
  const redis = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await redis.connect();
  log.info('Redis connected');
  return redis;
}
