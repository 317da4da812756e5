import { fileURLToPath } from 'node:url';
import { vi } from 'vitest';
import { createAssistant, type Assistant, type AssistantDeps } from '../src/assistant.js';
import { loadConfig, type AppConfig } from '../src/config.js';
import type { ConversationTurn } from '../src/domain/index.js';
import { loadIntentCatalog, loadResponseCatalog } from '../src/infrastructure/catalog/index.js';
import { InMemoryDurableStore } from '../src/infrastructure/persistence/index.js';

/** Fixed "now" for deterministic clocks. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();

/** Minimal fake logger; `child()` returns the same fake. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as import('pino').Logger;
}

let counter = 0;

/**
 * Factory for committed turns with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeTurn(overrides: Partial<ConversationTurn> = {}): ConversationTurn {
  counter++;
  return {
    turnId: overrides.turnId ?? `00000000-0000-4000-8000-${String(counter).padStart(12, '0')}`,
    sessionId: overrides.sessionId ?? 'session-a',
    sequenceNumber: overrides.sequenceNumber ?? 1,
    userInput: overrides.userInput ?? 'hello',
    detectedIntent: overrides.detectedIntent === undefined
      ? { name: 'greeting', confidence: 1, entities: {} }
      : overrides.detectedIntent,
    assistantResponse: overrides.assistantResponse ?? 'Hello! How can I help you today?',
    status: overrides.status ?? 'COMPLETE',
    createdAt: overrides.createdAt ?? new Date(FIXED_NOW).toISOString(),
    processingDurationMs: overrides.processingDurationMs ?? 3,
    metadata: overrides.metadata ?? {},
  };
}

export const INTENTS_PATH = fileURLToPath(new URL('../config/intents.json', import.meta.url));
export const RESPONSES_PATH = fileURLToPath(new URL('../config/responses.json', import.meta.url));

/** Config as the bootstrap would build it from an empty environment, plus overrides. */
export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({ PERSIST_RETRY_DELAY_MS: '0', ...env });
}

/** Assistant wired with the shipped catalogs and an in-memory store. */
export function buildTestAssistant(overrides: Partial<AssistantDeps> = {}): Assistant & { memory: InMemoryDurableStore } {
  const memory = new InMemoryDurableStore();
  const assistant = createAssistant({
    config: testConfig(),
    log: fakeLogger(),
    store: memory,
    intents: loadIntentCatalog(INTENTS_PATH),
    responses: loadResponseCatalog(RESPONSES_PATH),
    nowFn: () => FIXED_NOW,
    ...overrides,
  });
  return { ...assistant, memory };
}
