import { describe, it, expect, vi } from 'vitest';
import { StorageError } from '../src/domain/index.js';
import { buildTestAssistant } from './helpers.js';

describe('createAssistant', () => {
  it('records start and shutdown events in the durable store', async () => {
    const assistant = buildTestAssistant();

    assistant.start();
    await assistant.bus.idle();
    await assistant.shutdown('test over');

    const [started] = await assistant.memory.queryEvents('system.start', 1);
    const [stopped] = await assistant.memory.queryEvents('system.shutdown', 1);
    expect(started?.payload).toMatchObject({ store: 'memory', backend: null });
    expect(stopped?.payload).toMatchObject({ reason: 'test over', inFlight: 0 });
    expect(assistant.bus.isClosed).toBe(true);
  });

  it('shuts down only once', async () => {
    const assistant = buildTestAssistant();

    await assistant.shutdown();
    await expect(assistant.shutdown()).resolves.toBeUndefined();
  });

  it('persists committed turns and records failed ones', async () => {
    const assistant = buildTestAssistant();

    await assistant.orchestrator.submitTurn('s1', 'hello');
    await assistant.orchestrator.submitTurn('s1', "'; DROP TABLE users;--");
    await assistant.bus.idle();

    expect(assistant.memory.turnCount).toBe(1);
    const [failed] = await assistant.memory.queryEvents('conversation.turn_failed', 5);
    expect(failed?.payload).toMatchObject({ sessionId: 's1', kind: 'PolicyViolation' });
  });

  it('keeps the turn outcome when persistence fails', async () => {
    const assistant = buildTestAssistant();
    vi.spyOn(assistant.memory, 'persist').mockResolvedValue({ ok: false, error: new StorageError('disk full') });

    const outcome = await assistant.orchestrator.submitTurn('s1', 'hello');
    await assistant.bus.idle();

    expect(outcome.status).toBe('COMPLETE');
    expect(assistant.memory.turnCount).toBe(0);
    expect(assistant.contexts.get('s1').turns).toHaveLength(1);
  });

  it('routes configured intents to the generation backend', async () => {
    const complete = vi.fn().mockResolvedValue('  Let me think about that.  ');
    const assistant = buildTestAssistant({ backend: { name: 'stub', complete } });

    const outcome = await assistant.orchestrator.submitTurn('s1', 'the weather is nice');

    expect(outcome.intent?.name).toBe('fallback');
    expect(outcome.responseText).toBe('Let me think about that.');
    expect(complete).toHaveBeenCalledTimes(1);
  });
});
