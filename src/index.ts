import { resolve } from 'node:path';
import type { Redis } from 'ioredis';
import pino from 'pino';
import { createAssistant } from './assistant.js';
import { loadConfig } from './config.js';
import { OllamaBackend } from './infrastructure/backend/index.js';
import { loadIntentCatalog, loadResponseCatalog } from './infrastructure/catalog/index.js';
import { DrizzleDurableStore, createDbClient, ensureSchema } from './infrastructure/db/index.js';
import { InMemoryDurableStore, type DurableStore } from './infrastructure/persistence/index.js';
import { connectRedis } from './infrastructure/redis/index.js';
import { buildServer } from './interfaces/http/index.js';

/**
 * Bootstrap.
 *
 * Order:
 * 1) Config + catalogs (fail fast)
 * 2) Durable store (Postgres when DATABASE_URL is set, memory otherwise)
 * 3) Optional Redis notifier + generation backend
 * 4) Assistant core + HTTP routes
 * 5) Shutdown hooks, idle-session sweep
 * 6) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = pino({ level: config.logLevel });

  const intents = loadIntentCatalog(resolve(process.cwd(), config.intentsPath));
  const responses = loadResponseCatalog(resolve(process.cwd(), config.responsesPath));

  // --------------------------------------------------
  // Durable store
  // --------------------------------------------------

  let store: DurableStore;
  if (config.databaseUrl !== undefined) {
    const { sql, db } = createDbClient(config.databaseUrl, {
      maxConnections: config.dbPoolMax,
      log: log.child({ component: 'db' }),
    });
    await ensureSchema(sql, log);
    store = new DrizzleDurableStore(db, sql);
  } else {
    log.warn('DATABASE_URL not set, conversation history is kept in memory only');
    store = new InMemoryDurableStore();
  }

  // --------------------------------------------------
  // Optional integrations
  // --------------------------------------------------

  let redis: Redis | undefined;
  if (config.redisUrl !== undefined) {
    redis = await connectRedis(config.redisUrl, log);
  }

  const backend = config.generation.backend === 'ollama'
    ? new OllamaBackend({ baseUrl: config.generation.ollamaUrl, model: config.generation.ollamaModel })
    : undefined;

  // --------------------------------------------------
  // Core + HTTP
  // --------------------------------------------------

  const assistant = createAssistant({ config, log, store, intents, responses, redis, backend });
  const fastify = await buildServer(assistant, { logger: { level: config.logLevel } });

  let sweep: ReturnType<typeof setInterval> | null = null;
  if (config.sessionIdleTimeoutSeconds > 0) {
    const idleMs = config.sessionIdleTimeoutSeconds * 1000;
    sweep = setInterval(() => {
      assistant.orchestrator.endIdleSessions(Date.now() - idleMs)
        .then((ended) => {
          if (ended > 0) log.info({ ended }, 'Idle sessions ended');
        })
        .catch((err: unknown) => {
          log.error({ err }, 'Idle session sweep failed');
        });
    }, Math.min(idleMs, 60_000));
    sweep.unref();
  }

  // onClose MUST be registered BEFORE listen().
  // The bus must drain before the store and Redis go away.
  fastify.addHook('onClose', async () => {
    if (sweep !== null) clearInterval(sweep);
    await assistant.shutdown('server closed');
    await store.close();
    if (redis !== undefined) await redis.quit();
    log.info('Resources released');
  });

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down...');
    fastify.close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({ host: config.host, port: config.port });
  assistant.start();
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
