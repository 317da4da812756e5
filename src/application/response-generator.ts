import type { ContextSlots, Intent, SessionContext } from '../domain/index.js';

/** Extra per-turn inputs a strategy may use. */
export interface GenerationRequest {
  /** Raw user text of the turn being answered. */
  readonly userInput?: string;
  /** Aborted when the turn's deadline passes. */
  readonly signal?: AbortSignal;
}

/** What generation hands back to the orchestrator. */
export interface GeneratedResponse {
  readonly text: string;
  /** Slot updates the orchestrator commits together with the turn. */
  readonly slots: ContextSlots;
}

/**
 * Produces the text for one intent. Strategies must not mutate the
 * context; slot changes are returned instead.
 */
export interface ResponseStrategy {
  readonly name: string;
  respond(intent: Intent, context: SessionContext, request: GenerationRequest): Promise<GeneratedResponse>;
}

/**
 * Routes each intent to its strategy, or to the default one.
 */
export class ResponseGenerator {
  private readonly byIntent: Map<string, ResponseStrategy> = new Map();
  private readonly defaultStrategy: ResponseStrategy;

  constructor(defaultStrategy: ResponseStrategy, overrides: Readonly<Record<string, ResponseStrategy>> = {}) {
    this.defaultStrategy = defaultStrategy;
    for (const [intent, strategy] of Object.entries(overrides)) {
      this.byIntent.set(intent, strategy);
    }
  }

  /** Sends `intent` to `strategy` instead of the default. */
  route(intent: string, strategy: ResponseStrategy): void {
    this.byIntent.set(intent, strategy);
  }

  strategyFor(intent: string): ResponseStrategy {
    return this.byIntent.get(intent) ?? this.defaultStrategy;
  }

  async generate(intent: Intent, context: SessionContext, request: GenerationRequest = {}): Promise<GeneratedResponse> {
    return this.strategyFor(intent.name).respond(intent, context, request);
  }
}
