export { eventDraftSchema, intentSchema, turnEventPayloadSchema } from './event-schema.js';
export type { TurnEventPayload } from './event-schema.js';
export { intentCatalogSchema, responseCatalogSchema } from './catalog-schema.js';
export type { IntentCatalog, ResponseCatalog } from './catalog-schema.js';
export { submitTurnBodySchema, sessionParamsSchema, turnParamsSchema, historyQuerySchema } from './turn-request-schema.js';
export type { SubmitTurnBody } from './turn-request-schema.js';
export { PolicyEngine } from './policy-engine.js';
export {
  IntentDetector,
  DEFAULT_MIN_CONFIDENCE,
  createPatternGroupMatcher,
  normalizeText,
  scoreSpans,
} from './intent-detector.js';
export type { IntentMatcher, IntentDetectorOptions } from './intent-detector.js';
export { InMemoryContextStore, DEFAULT_HISTORY_CAP } from './context-store.js';
export type { ContextStore } from './context-store.js';
export { ResponseGenerator } from './response-generator.js';
export type { GeneratedResponse, GenerationRequest, ResponseStrategy } from './response-generator.js';
export { TemplateStrategy, variantSlot } from './template-strategy.js';
export type { ResponseTemplates, TemplateStrategyOptions } from './template-strategy.js';
export { BackendStrategy, buildPrompt } from './backend-strategy.js';
export type { BackendStrategyOptions, GenerationBackend } from './backend-strategy.js';
export { clockSlots, renderTemplate, placeholders, rememberedEntities, ENTITY_SLOT_PREFIX } from './template.js';
export { SessionLock } from './session-lock.js';
export { withDeadline } from './deadline.js';
export { assertTransition, validateTransition, isTerminal, isCancellable } from './turn-state.js';
export { TurnOrchestrator, ORCHESTRATOR_SOURCE, DEFAULT_TURN_TIMEOUT_MS } from './turn-orchestrator.js';
export type { TurnHandle, TurnHistory, TurnOptions, TurnOrchestratorDeps } from './turn-orchestrator.js';
