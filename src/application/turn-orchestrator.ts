import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import {
  DuplicateTurnError,
  FALLBACK_INTENT,
  RESPONSES,
  StageTimeoutError,
  TOPICS,
  type CancelResult,
  type ContextSlots,
  type ConversationTurn,
  type DegradedReason,
  type EventPayload,
  type Intent,
  type PolicyViolations,
  type SessionContext,
  type TurnError,
  type TurnMetadata,
  type TurnOutcome,
  type TurnState,
} from '../domain/index.js';
import type { EventBus } from '../infrastructure/bus/index.js';
import type { ContextStore } from './context-store.js';
import { withDeadline } from './deadline.js';
import { normalizeText, type IntentDetector } from './intent-detector.js';
import type { PolicyEngine } from './policy-engine.js';
import type { ResponseGenerator } from './response-generator.js';
import { SessionLock } from './session-lock.js';
import { assertTransition, isCancellable, isTerminal } from './turn-state.js';

export const ORCHESTRATOR_SOURCE = 'turn_orchestrator';
export const DEFAULT_TURN_TIMEOUT_MS = 10_000;

/** Finished turn ids remembered to reject reuse of a caller-supplied id. */
const RECENT_TURN_IDS = 1_000;

/** Read side of the durable store, used to hydrate fresh sessions. */
export interface TurnHistory {
  query(sessionId: string, limit: number): Promise<ConversationTurn[]>;
}

export interface TurnOrchestratorDeps {
  bus: EventBus;
  policy: PolicyEngine;
  detector: IntentDetector;
  contexts: ContextStore;
  generator: ResponseGenerator;
  log: Logger;
  history?: TurnHistory;
  timeoutMs?: number;
  nowFn?: () => number;
  idFn?: () => string;
}

export interface TurnOptions {
  /** Caller-chosen id, so the turn can be cancelled before it finishes. Generated when absent. */
  turnId?: string;
  /** Overrides the default deadline for each bounded wait in this turn. */
  timeoutMs?: number;
  metadata?: TurnMetadata;
}

/** A turn in flight. */
export interface TurnHandle {
  readonly turnId: string;
  readonly sessionId: string;
  state(): TurnState;
  cancel(): CancelResult;
  readonly outcome: Promise<TurnOutcome>;
}

interface ActiveTurn {
  readonly turnId: string;
  readonly sessionId: string;
  state: TurnState;
  cancelRequested: boolean;
  intent: Intent | null;
  startedAt: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function toTurnPayload(turn: ConversationTurn): EventPayload {
  return {
    turnId: turn.turnId,
    sessionId: turn.sessionId,
    sequenceNumber: turn.sequenceNumber,
    userInput: turn.userInput,
    detectedIntent: turn.detectedIntent,
    assistantResponse: turn.assistantResponse,
    status: turn.status,
    createdAt: turn.createdAt,
    processingDurationMs: turn.processingDurationMs,
    metadata: turn.metadata,
  };
}

/**
 * Drives one user input through the turn pipeline:
 *
 *   RECEIVED → INPUT_VALIDATED → INTENT_DETECTED → CONTEXT_UPDATED →
 *   RESPONSE_GENERATED → OUTPUT_VALIDATED → PUBLISHED → COMPLETE | DEGRADED
 *
 * with FAILED reachable from every non-terminal state. A state names the
 * stage currently running.
 *
 * Turns of one session run one at a time, in submission order. A turn is
 * committed to the context at PUBLISHED, together with the
 * `conversation.turn` event; if either fails, the context is rolled back.
 * Persistence happens asynchronously through the bus and is not awaited.
 */
export class TurnOrchestrator {
  private readonly bus: EventBus;
  private readonly policy: PolicyEngine;
  private readonly detector: IntentDetector;
  private readonly contexts: ContextStore;
  private readonly generator: ResponseGenerator;
  private readonly history: TurnHistory | undefined;
  private readonly log: Logger;
  private readonly timeoutMs: number;
  private readonly nowFn: () => number;
  private readonly idFn: () => string;
  private readonly locks = new SessionLock();
  private readonly active: Map<string, ActiveTurn> = new Map();
  private readonly recentTurnIds: Set<string> = new Set();

  constructor(deps: TurnOrchestratorDeps) {
    this.bus = deps.bus;
    this.policy = deps.policy;
    this.detector = deps.detector;
    this.contexts = deps.contexts;
    this.generator = deps.generator;
    this.history = deps.history;
    this.log = deps.log;
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_TURN_TIMEOUT_MS;
    this.nowFn = deps.nowFn ?? Date.now;
    this.idFn = deps.idFn ?? randomUUID;

    this.bus.registerPublisher(ORCHESTRATOR_SOURCE, [
      TOPICS.conversationTurn,
      TOPICS.conversationTurnFailed,
      TOPICS.sessionEnded,
    ]);
  }

  // ── Public API ────────────────────────────────────────────────────

  /**
   * Starts a turn and returns immediately with a handle to it.
   *
   * @throws DuplicateTurnError when `options.turnId` is in flight or recently finished
   */
  startTurn(sessionId: string, text: string, options: TurnOptions = {}): TurnHandle {
    const turnId = options.turnId ?? this.idFn();
    if (this.active.has(turnId) || this.recentTurnIds.has(turnId)) {
      throw new DuplicateTurnError(turnId);
    }

    const turn: ActiveTurn = {
      turnId,
      sessionId,
      state: 'RECEIVED',
      cancelRequested: false,
      intent: null,
      startedAt: this.nowFn(),
    };
    this.active.set(turn.turnId, turn);

    const outcome = this.run(turn, text, options).finally(() => {
      this.active.delete(turn.turnId);
      this.rememberFinished(turn.turnId);
    });

    return {
      turnId: turn.turnId,
      sessionId,
      state: () => turn.state,
      cancel: () => this.cancelTurn(turn.turnId),
      outcome,
    };
  }

  /**
   * Runs a turn to completion. Pipeline failures come back as FAILED
   * outcomes; the only rejection is DuplicateTurnError.
   */
  async submitTurn(sessionId: string, text: string, options: TurnOptions = {}): Promise<TurnOutcome> {
    return this.startTurn(sessionId, text, options).outcome;
  }

  /**
   * Requests cancellation. Accepted only before the context stage; the
   * turn then fails with Cancelled at its next checkpoint.
   */
  cancelTurn(turnId: string): CancelResult {
    const turn = this.active.get(turnId);
    if (turn === undefined) return { ok: false, error: 'NotFound', turnId };

    if (!isCancellable(turn.state)) {
      return { ok: false, error: 'CancellationRejected', turnId, state: turn.state };
    }

    turn.cancelRequested = true;
    this.log.info({ turnId, sessionId: turn.sessionId, state: turn.state }, 'Turn cancellation requested');
    return { ok: true, turnId, state: turn.state };
  }

  /** Drops the session's context once its in-flight turns are done. */
  async endSession(sessionId: string): Promise<boolean> {
    return this.locks.runExclusive(sessionId, async () => {
      const ended = this.contexts.endSession(sessionId);
      if (!ended) return false;

      this.publishBestEffort(TOPICS.sessionEnded, { sessionId, endedAt: new Date(this.nowFn()).toISOString() }, null);
      this.log.info({ sessionId }, 'Session ended');
      return true;
    });
  }

  /** Ends every session idle since before `cutoffMs`. Returns how many were ended. */
  async endIdleSessions(cutoffMs: number): Promise<number> {
    let ended = 0;
    for (const sessionId of this.contexts.idleSessions(cutoffMs)) {
      if (await this.endSession(sessionId)) ended++;
    }
    return ended;
  }

  get inFlight(): number {
    return this.active.size;
  }

  private rememberFinished(turnId: string): void {
    this.recentTurnIds.add(turnId);
    if (this.recentTurnIds.size > RECENT_TURN_IDS) {
      const [oldest] = this.recentTurnIds;
      if (oldest !== undefined) this.recentTurnIds.delete(oldest);
    }
  }

  // ── Pipeline ──────────────────────────────────────────────────────

  private async run(turn: ActiveTurn, text: string, options: TurnOptions): Promise<TurnOutcome> {
    const release = await this.locks.acquire(turn.sessionId);
    turn.startedAt = this.nowFn();

    try {
      return await this.process(turn, text, options);
    } catch (err: unknown) {
      this.log.error({ err, turnId: turn.turnId, sessionId: turn.sessionId, state: turn.state }, 'Turn pipeline fault');
      return this.fail(turn, { kind: 'SystemError', stage: turn.state, message: errorMessage(err) });
    } finally {
      release();
    }
  }

  private async process(turn: ActiveTurn, text: string, options: TurnOptions): Promise<TurnOutcome> {
    const { sessionId } = turn;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    if (turn.cancelRequested) return this.cancelled(turn);

    // ── Input policy ──
    this.transition(turn, 'INPUT_VALIDATED');
    const input = this.policy.evaluate(text, 'input', { sessionId });
    if (!input.passed) {
      return this.fail(
        turn,
        { kind: 'PolicyViolation', direction: 'input', message: 'Input rejected by policy' },
        input.violations,
      );
    }
    if (turn.cancelRequested) return this.cancelled(turn);

    // ── Intent ──
    this.transition(turn, 'INTENT_DETECTED');
    const [intent = FALLBACK_INTENT] = this.detector.detect(normalizeText(text));
    turn.intent = intent;
    if (turn.cancelRequested) return this.cancelled(turn);

    // ── Context ──
    this.transition(turn, 'CONTEXT_UPDATED');
    let context: SessionContext;
    try {
      context = await this.loadContext(sessionId, timeoutMs);
    } catch (err: unknown) {
      return this.failFromError(turn, err);
    }
    const sequenceNumber = context.lastSequenceNumber + 1;

    // ── Generation ──
    this.transition(turn, 'RESPONSE_GENERATED');
    let responseText: string;
    let slots: ContextSlots = {};
    let degradedReason: DegradedReason | undefined;
    try {
      const generated = await withDeadline('RESPONSE_GENERATED', timeoutMs, (signal) =>
        this.generator.generate(intent, context, { userInput: text, signal }));
      responseText = generated.text;
      slots = generated.slots;
    } catch (err: unknown) {
      if (err instanceof StageTimeoutError) return this.failFromError(turn, err);

      this.log.error({ err, turnId: turn.turnId, sessionId, intent: intent.name }, 'Response generation failed');
      responseText = RESPONSES.apology;
      degradedReason = 'generation_failed';
    }

    // ── Output policy ──
    this.transition(turn, 'OUTPUT_VALIDATED');
    let violations: PolicyViolations | undefined;
    const output = this.policy.evaluate(responseText, 'output', { sessionId });
    if (!output.passed) {
      responseText = RESPONSES.safeFallback;
      degradedReason ??= 'output_policy';
      violations = output.violations;
    }

    // ── Commit + publish ──
    this.transition(turn, 'PUBLISHED');
    const finalState = degradedReason === undefined ? 'COMPLETE' : 'DEGRADED';
    const committed: ConversationTurn = {
      turnId: turn.turnId,
      sessionId,
      sequenceNumber,
      userInput: text,
      detectedIntent: intent,
      assistantResponse: responseText,
      status: finalState,
      createdAt: new Date(this.nowFn()).toISOString(),
      processingDurationMs: this.nowFn() - turn.startedAt,
      metadata: options.metadata ?? {},
    };

    try {
      this.contexts.appendTurn(sessionId, committed, slots);
    } catch (err: unknown) {
      return this.failFromError(turn, err);
    }

    try {
      this.bus.publish({
        topic: TOPICS.conversationTurn,
        source: ORCHESTRATOR_SOURCE,
        correlationId: turn.turnId,
        payload: toTurnPayload(committed),
      });
    } catch (err: unknown) {
      this.contexts.restore(context);
      this.log.warn({ turnId: turn.turnId, sessionId }, 'Turn publish failed, context rolled back');
      return this.failFromError(turn, err);
    }

    this.transition(turn, finalState);
    this.log.info(
      {
        turnId: turn.turnId,
        sessionId,
        sequenceNumber,
        intent: intent.name,
        confidence: intent.confidence,
        state: finalState,
        degradedReason,
        durationMs: committed.processingDurationMs,
      },
      'Turn completed',
    );

    return {
      turnId: turn.turnId,
      sessionId,
      status: finalState,
      state: finalState,
      responseText,
      intent,
      sequenceNumber,
      ...(violations !== undefined && { violations }),
      ...(degradedReason !== undefined && { degradedReason }),
      processingDurationMs: committed.processingDurationMs,
    };
  }

  private async loadContext(sessionId: string, timeoutMs: number): Promise<SessionContext> {
    const context = this.contexts.get(sessionId);
    const history = this.history;
    if (context.hydrated || history === undefined) return context;

    const turns = await withDeadline('CONTEXT_UPDATED', timeoutMs, () =>
      history.query(sessionId, this.contexts.capacity));
    this.log.debug({ sessionId, turns: turns.length }, 'Session context hydrated');
    return this.contexts.hydrate(sessionId, turns);
  }

  // ── Termination helpers ───────────────────────────────────────────

  private transition(turn: ActiveTurn, next: TurnState): void {
    assertTransition(turn.state, next);
    turn.state = next;
  }

  private cancelled(turn: ActiveTurn): TurnOutcome {
    return this.fail(turn, { kind: 'Cancelled', stage: turn.state, message: 'Turn cancelled' });
  }

  private failFromError(turn: ActiveTurn, err: unknown): TurnOutcome {
    if (err instanceof StageTimeoutError) {
      return this.fail(turn, { kind: 'Timeout', stage: turn.state, message: err.message, systemError: true });
    }
    this.log.error({ err, turnId: turn.turnId, sessionId: turn.sessionId, state: turn.state }, 'Turn stage failed');
    return this.fail(turn, { kind: 'SystemError', stage: turn.state, message: errorMessage(err) });
  }

  private fail(turn: ActiveTurn, error: TurnError, violations?: PolicyViolations): TurnOutcome {
    if (!isTerminal(turn.state)) this.transition(turn, 'FAILED');

    const processingDurationMs = this.nowFn() - turn.startedAt;
    const responseText = error.kind === 'PolicyViolation' ? RESPONSES.denial : RESPONSES.apology;

    this.publishBestEffort(
      TOPICS.conversationTurnFailed,
      {
        turnId: turn.turnId,
        sessionId: turn.sessionId,
        kind: error.kind,
        stage: 'stage' in error ? error.stage : 'INPUT_VALIDATED',
        message: error.message,
        rules: Object.keys(violations ?? {}),
        failedAt: new Date(this.nowFn()).toISOString(),
      },
      turn.turnId,
    );

    this.log.info(
      { turnId: turn.turnId, sessionId: turn.sessionId, kind: error.kind, message: error.message },
      'Turn failed',
    );

    return {
      turnId: turn.turnId,
      sessionId: turn.sessionId,
      status: 'FAILED',
      state: 'FAILED',
      responseText,
      intent: turn.intent,
      sequenceNumber: null,
      ...(violations !== undefined && { violations }),
      error,
      processingDurationMs,
    };
  }

  private publishBestEffort(topic: string, payload: EventPayload, correlationId: string | null): void {
    try {
      this.bus.publish({ topic, source: ORCHESTRATOR_SOURCE, correlationId, payload });
    } catch (err: unknown) {
      this.log.warn({ err, topic }, 'Failed to publish event');
    }
  }
}
