import {
  StorageError,
  type ContextSlots,
  type ConversationTurn,
  type SessionContext,
} from '../domain/index.js';

export const DEFAULT_HISTORY_CAP = 20;

/** How many ended sessions keep their sequence high-water mark. */
const MAX_ENDED_SESSIONS = 10_000;

/**
 * Per-session conversation state.
 *
 * Reads return snapshots; callers never hold a live reference. Writes for
 * one session are serialized by the orchestrator's session lock, so the
 * store itself does no locking.
 */
export interface ContextStore {
  readonly capacity: number;
  readonly size: number;

  /** Returns the session's context, creating an empty one on first access. */
  get(sessionId: string): SessionContext;

  has(sessionId: string): boolean;

  /**
   * Appends a turn and merges slot updates. `turn.sequenceNumber` must be
   * exactly `lastSequenceNumber + 1`.
   */
  appendTurn(sessionId: string, turn: ConversationTurn, slots?: ContextSlots): SessionContext;

  /** Seeds an unhydrated context from durable history (any order). */
  hydrate(sessionId: string, turns: readonly ConversationTurn[]): SessionContext;

  /** Puts back a snapshot taken earlier by `get`. */
  restore(snapshot: SessionContext): void;

  /**
   * Drops the session's turns and slots. Returns false if it was unknown.
   * The last sequence number is remembered, so a session that comes back
   * continues its numbering even before durable history catches up.
   */
  endSession(sessionId: string): boolean;

  /** Sessions with no activity since `cutoffMs` (epoch millis). */
  idleSessions(cutoffMs: number): string[];
}

interface SessionState {
  sessionId: string;
  turns: ConversationTurn[];
  slots: ContextSlots;
  lastSequenceNumber: number;
  hydrated: boolean;
  createdAt: number;
  lastActiveAt: number;
}

/**
 * Map-backed context store with a bounded history per session.
 * The oldest turns are evicted once `capacity` is exceeded.
 */
export class InMemoryContextStore implements ContextStore {
  readonly capacity: number;
  private readonly sessions: Map<string, SessionState> = new Map();
  private readonly endedHighWater: Map<string, number> = new Map();
  private readonly nowFn: () => number;

  constructor(capacity: number = DEFAULT_HISTORY_CAP, nowFn: () => number = Date.now) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.nowFn = nowFn;
  }

  get size(): number {
    return this.sessions.size;
  }

  get(sessionId: string): SessionContext {
    const state = this.ensure(sessionId);
    state.lastActiveAt = this.nowFn();
    return snapshot(state);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  appendTurn(sessionId: string, turn: ConversationTurn, slots: ContextSlots = {}): SessionContext {
    const state = this.ensure(sessionId);
    const expected = state.lastSequenceNumber + 1;

    if (turn.sessionId !== sessionId) {
      throw new StorageError(`Turn ${turn.turnId} belongs to session ${turn.sessionId}, not ${sessionId}`);
    }
    if (turn.sequenceNumber !== expected) {
      throw new StorageError(
        `Out-of-order sequence number for session ${sessionId}: expected ${expected}, got ${turn.sequenceNumber}`,
      );
    }

    state.turns.push(turn);
    if (state.turns.length > this.capacity) {
      state.turns.splice(0, state.turns.length - this.capacity);
    }
    state.slots = { ...state.slots, ...slots };
    state.lastSequenceNumber = turn.sequenceNumber;
    state.lastActiveAt = this.nowFn();

    return snapshot(state);
  }

  hydrate(sessionId: string, turns: readonly ConversationTurn[]): SessionContext {
    const state = this.ensure(sessionId);
    if (state.hydrated) return snapshot(state);

    const bySequence = new Map<number, ConversationTurn>();
    for (const turn of [...turns, ...state.turns]) {
      if (turn.sessionId === sessionId) bySequence.set(turn.sequenceNumber, turn);
    }

    state.turns = [...bySequence.values()]
      .sort((a, b) => a.sequenceNumber - b.sequenceNumber)
      .slice(-this.capacity);
    state.lastSequenceNumber = Math.max(
      state.lastSequenceNumber,
      state.turns.at(-1)?.sequenceNumber ?? 0,
    );
    state.hydrated = true;

    return snapshot(state);
  }

  restore(previous: SessionContext): void {
    this.sessions.set(previous.sessionId, {
      sessionId: previous.sessionId,
      turns: [...previous.turns],
      slots: { ...previous.slots },
      lastSequenceNumber: previous.lastSequenceNumber,
      hydrated: previous.hydrated,
      createdAt: Date.parse(previous.createdAt),
      lastActiveAt: Date.parse(previous.lastActiveAt),
    });
  }

  endSession(sessionId: string): boolean {
    const state = this.sessions.get(sessionId);
    if (state === undefined) return false;

    this.sessions.delete(sessionId);
    if (state.lastSequenceNumber > 0) {
      this.endedHighWater.delete(sessionId);
      this.endedHighWater.set(sessionId, state.lastSequenceNumber);
      if (this.endedHighWater.size > MAX_ENDED_SESSIONS) {
        const [oldest] = this.endedHighWater.keys();
        if (oldest !== undefined) this.endedHighWater.delete(oldest);
      }
    }
    return true;
  }

  idleSessions(cutoffMs: number): string[] {
    const idle: string[] = [];
    for (const state of this.sessions.values()) {
      if (state.lastActiveAt < cutoffMs) idle.push(state.sessionId);
    }
    return idle;
  }

  private ensure(sessionId: string): SessionState {
    let state = this.sessions.get(sessionId);
    if (state === undefined) {
      const now = this.nowFn();
      const highWater = this.endedHighWater.get(sessionId) ?? 0;
      this.endedHighWater.delete(sessionId);
      state = {
        sessionId,
        turns: [],
        slots: {},
        lastSequenceNumber: highWater,
        hydrated: false,
        createdAt: now,
        lastActiveAt: now,
      };
      this.sessions.set(sessionId, state);
    }
    return state;
  }
}

function snapshot(state: SessionState): SessionContext {
  return {
    sessionId: state.sessionId,
    turns: [...state.turns],
    slots: { ...state.slots },
    lastSequenceNumber: state.lastSequenceNumber,
    hydrated: state.hydrated,
    createdAt: new Date(state.createdAt).toISOString(),
    lastActiveAt: new Date(state.lastActiveAt).toISOString(),
  };
}
