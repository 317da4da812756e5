import type { Logger } from 'pino';
import {
  BackendStrategy,
  InMemoryContextStore,
  IntentDetector,
  PolicyEngine,
  ResponseGenerator,
  TemplateStrategy,
  TurnOrchestrator,
  type ContextStore,
  type GenerationBackend,
  type IntentCatalog,
  type ResponseCatalog,
} from './application/index.js';
import type { AppConfig } from './config.js';
import { TOPICS } from './domain/index.js';
import { EventBus } from './infrastructure/bus/index.js';
import {
  startSystemEventRecorder,
  startTurnPersister,
  type DurableStore,
} from './infrastructure/persistence/index.js';
import { buildDefaultValidators } from './infrastructure/policy/index.js';
import { startTurnNotifier, type RedisPublisher } from './infrastructure/redis/index.js';

const SYSTEM_SOURCE = 'system';

export interface AssistantDeps {
  config: AppConfig;
  log: Logger;
  store: DurableStore;
  intents: IntentCatalog;
  responses: ResponseCatalog;
  redis?: RedisPublisher;
  backend?: GenerationBackend;
  /** Epoch-millis clock shared by every time-dependent component. */
  nowFn?: () => number;
}

/** The wired core, as the HTTP layer and the bootstrap see it. */
export interface Assistant {
  readonly bus: EventBus;
  readonly policy: PolicyEngine;
  readonly detector: IntentDetector;
  readonly contexts: ContextStore;
  readonly generator: ResponseGenerator;
  readonly orchestrator: TurnOrchestrator;
  readonly store: DurableStore;
  readonly startedAt: string;
  /** Publishes `system.start`. */
  start(): void;
  /** Publishes `system.shutdown`, drains the bus and detaches subscribers. */
  shutdown(reason?: string): Promise<void>;
}

/**
 * Builds the assistant core from configuration and already-open
 * resources. Owns nothing it did not create: the store and the Redis
 * connection are closed by the caller.
 */
export function createAssistant(deps: AssistantDeps): Assistant {
  const { config, log, store } = deps;
  const nowFn = deps.nowFn ?? Date.now;

  const bus = new EventBus({ log: log.child({ component: 'bus' }), nowFn: () => new Date(nowFn()) });
  bus.registerPublisher(SYSTEM_SOURCE, [TOPICS.systemStart, TOPICS.systemShutdown]);

  const policy = new PolicyEngine(log.child({ component: 'policy' }), buildDefaultValidators(config.policy, nowFn));

  const detector = IntentDetector.fromCatalog(deps.intents.intents, {
    minConfidence: config.intentMinConfidence ?? deps.intents.min_confidence,
    log: log.child({ component: 'intent' }),
  });

  const contexts = new InMemoryContextStore(config.historyCap, nowFn);

  const templates = new TemplateStrategy(deps.responses.responses, { nowFn: () => new Date(nowFn()) });
  const generator = new ResponseGenerator(templates);
  if (deps.backend !== undefined) {
    const backendStrategy = new BackendStrategy(deps.backend, {
      fallback: templates,
      log: log.child({ component: 'generation' }),
    });
    for (const intent of config.generation.intents) {
      generator.route(intent, backendStrategy);
    }
  }

  const orchestrator = new TurnOrchestrator({
    bus,
    policy,
    detector,
    contexts,
    generator,
    history: store,
    timeoutMs: config.turnTimeoutMs,
    nowFn,
    log: log.child({ component: 'orchestrator' }),
  });

  const detach = [
    startTurnPersister(bus, store, log.child({ component: 'persister' }), {
      maxAttempts: config.persistMaxAttempts,
      retryDelayMs: config.persistRetryDelayMs,
    }),
    startSystemEventRecorder(bus, store, log.child({ component: 'recorder' })),
  ];
  if (deps.redis !== undefined) {
    detach.push(startTurnNotifier(bus, deps.redis, log.child({ component: 'notifier' })));
  }

  const startedAt = new Date(nowFn()).toISOString();
  let stopped = false;

  return {
    bus,
    policy,
    detector,
    contexts,
    generator,
    orchestrator,
    store,
    startedAt,

    start(): void {
      bus.publish({
        topic: TOPICS.systemStart,
        source: SYSTEM_SOURCE,
        payload: {
          startedAt,
          store: store.kind,
          intents: detector.intents,
          validators: policy.validatorNames,
          backend: deps.backend?.name ?? null,
        },
      });
      log.info({ store: store.kind, intents: detector.intents.length }, 'Assistant started');
    },

    async shutdown(reason = 'shutdown'): Promise<void> {
      if (stopped) return;
      stopped = true;

      bus.publish({
        topic: TOPICS.systemShutdown,
        source: SYSTEM_SOURCE,
        payload: { reason, inFlight: orchestrator.inFlight, stoppedAt: new Date(nowFn()).toISOString() },
      });
      await bus.close();
      for (const unsubscribe of detach) unsubscribe();
      log.info({ reason }, 'Assistant stopped');
    },
  };
}
