import { describe, it, expect } from 'vitest';
import { InMemoryContextStore } from '../../src/application/context-store.js';
import { StorageError } from '../../src/domain/index.js';
import { FIXED_NOW, makeTurn } from '../helpers.js';

describe('InMemoryContextStore', () => {
  it('creates an empty context on first access', () => {
    const store = new InMemoryContextStore(3, () => FIXED_NOW);
    expect(store.get('s1')).toEqual({
      sessionId: 's1',
      turns: [],
      slots: {},
      lastSequenceNumber: 0,
      hydrated: false,
      createdAt: '2026-02-18T12:00:00.000Z',
      lastActiveAt: '2026-02-18T12:00:00.000Z',
    });
    expect(store.has('s1')).toBe(true);
  });

  it('appends turns and merges slots', () => {
    const store = new InMemoryContextStore(3);
    store.appendTurn('s1', makeTurn({ sessionId: 's1', sequenceNumber: 1 }), { a: 1 });
    const context = store.appendTurn('s1', makeTurn({ sessionId: 's1', sequenceNumber: 2 }), { b: 2 });

    expect(context.turns.map((t) => t.sequenceNumber)).toEqual([1, 2]);
    expect(context.slots).toEqual({ a: 1, b: 2 });
    expect(context.lastSequenceNumber).toBe(2);
  });

  it('evicts the oldest turns beyond capacity but keeps numbering', () => {
    const store = new InMemoryContextStore(2);
    for (let seq = 1; seq <= 4; seq++) {
      store.appendTurn('s1', makeTurn({ sessionId: 's1', sequenceNumber: seq }));
    }

    const context = store.get('s1');
    expect(context.turns.map((t) => t.sequenceNumber)).toEqual([3, 4]);
    expect(context.lastSequenceNumber).toBe(4);
  });

  it('rejects a sequence number that is not next in line', () => {
    const store = new InMemoryContextStore();
    store.appendTurn('s1', makeTurn({ sessionId: 's1', sequenceNumber: 1 }));

    expect(() => store.appendTurn('s1', makeTurn({ sessionId: 's1', sequenceNumber: 3 })))
      .toThrow(StorageError);
    expect(store.get('s1').lastSequenceNumber).toBe(1);
  });

  it('rejects a turn from another session', () => {
    const store = new InMemoryContextStore();
    expect(() => store.appendTurn('s1', makeTurn({ sessionId: 's2', sequenceNumber: 1 }))).toThrow(StorageError);
  });

  it('returns snapshots that later writes do not change', () => {
    const store = new InMemoryContextStore();
    const before = store.get('s1');
    store.appendTurn('s1', makeTurn({ sessionId: 's1', sequenceNumber: 1 }), { x: 1 });

    expect(before.turns).toEqual([]);
    expect(before.slots).toEqual({});
  });

  it('restores an earlier snapshot', () => {
    const store = new InMemoryContextStore();
    const snapshot = store.get('s1');
    store.appendTurn('s1', makeTurn({ sessionId: 's1', sequenceNumber: 1 }), { x: 1 });

    store.restore(snapshot);

    const context = store.get('s1');
    expect(context.turns).toEqual([]);
    expect(context.slots).toEqual({});
    expect(context.lastSequenceNumber).toBe(0);
  });

  it('hydrates from durable history in any order, keeping the newest', () => {
    const store = new InMemoryContextStore(2);
    const history = [3, 1, 2].map((seq) => makeTurn({ sessionId: 's1', sequenceNumber: seq }));

    const context = store.hydrate('s1', history);

    expect(context.hydrated).toBe(true);
    expect(context.turns.map((t) => t.sequenceNumber)).toEqual([2, 3]);
    expect(context.lastSequenceNumber).toBe(3);
  });

  it('hydrates only once', () => {
    const store = new InMemoryContextStore();
    store.hydrate('s1', []);
    const context = store.hydrate('s1', [makeTurn({ sessionId: 's1', sequenceNumber: 7 })]);
    expect(context.lastSequenceNumber).toBe(0);
  });

  it('ends a session and reports unknown ones', () => {
    const store = new InMemoryContextStore();
    store.get('s1');

    expect(store.endSession('s1')).toBe(true);
    expect(store.endSession('s1')).toBe(false);
    expect(store.has('s1')).toBe(false);
    expect(store.get('s1').lastSequenceNumber).toBe(0);
  });

  it('continues numbering after a session ends, even with empty durable history', () => {
    const store = new InMemoryContextStore();
    store.appendTurn('s1', makeTurn({ sessionId: 's1', sequenceNumber: 1 }));
    store.appendTurn('s1', makeTurn({ sessionId: 's1', sequenceNumber: 2 }));

    store.endSession('s1');
    const reopened = store.hydrate('s1', []);

    expect(reopened.turns).toEqual([]);
    expect(reopened.lastSequenceNumber).toBe(2);
    expect(() => store.appendTurn('s1', makeTurn({ sessionId: 's1', sequenceNumber: 3 }))).not.toThrow();
  });

  it('lists sessions idle since a cutoff', () => {
    let now = 1_000;
    const store = new InMemoryContextStore(20, () => now);
    store.get('old');
    now = 5_000;
    store.get('fresh');

    expect(store.idleSessions(2_000)).toEqual(['old']);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new InMemoryContextStore(0)).toThrow(RangeError);
  });
});
