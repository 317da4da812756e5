import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { RESPONSES } from '../../src/domain/index.js';
import { buildServer, statusForOutcome } from '../../src/interfaces/http/index.js';
import { buildTestAssistant, makeTurn } from '../helpers.js';

describe('HTTP routes', () => {
  let assistant: ReturnType<typeof buildTestAssistant>;
  let app: FastifyInstance;

  beforeEach(async () => {
    assistant = buildTestAssistant();
    app = await buildServer(assistant);
  });

  afterEach(async () => {
    await app.close();
  });

  // ── POST /api/v1/sessions/:session_id/turns ──────────────

  it('runs a turn and answers 200 with the outcome', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/sessions/s1/turns',
      payload: { text: 'hello' },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe('COMPLETE');
    expect(body.sequenceNumber).toBe(1);
    expect(body.intent.name).toBe('greeting');
    expect(body.responseText).toBe('Hello! How can I help you today?');
  });

  it('answers 422 with a denial when input policy fails', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/sessions/s1/turns',
      payload: { text: "'; DROP TABLE users;--" },
    });

    expect(res.statusCode).toBe(422);
    expect(res.json().responseText).toBe(RESPONSES.denial);
    expect(res.json().error.kind).toBe('PolicyViolation');
  });

  it('answers 400 for an invalid body or session id', async () => {
    const empty = await app.inject({ method: 'POST', url: '/api/v1/sessions/s1/turns', payload: { text: '' } });
    const badId = await app.inject({ method: 'POST', url: '/api/v1/sessions/bad%20id/turns', payload: { text: 'hello' } });

    expect(empty.statusCode).toBe(400);
    expect(badId.statusCode).toBe(400);
    expect(assistant.contexts.size).toBe(0);
  });

  // ── GET /api/v1/sessions/:session_id/turns ───────────────

  it('returns persisted history, most recent first', async () => {
    await app.inject({ method: 'POST', url: '/api/v1/sessions/s1/turns', payload: { text: 'hello' } });
    await app.inject({ method: 'POST', url: '/api/v1/sessions/s1/turns', payload: { text: 'thanks' } });
    await assistant.bus.idle();

    const res = await app.inject({ method: 'GET', url: '/api/v1/sessions/s1/turns' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.session_id).toBe('s1');
    expect(body.count).toBe(2);
    expect(body.turns.map((t: { userInput: string }) => t.userInput)).toEqual(['thanks', 'hello']);
  });

  it('clamps the history limit', async () => {
    for (let seq = 1; seq <= 3; seq++) {
      await assistant.memory.persist(makeTurn({ sessionId: 's2', sequenceNumber: seq }));
    }

    const res = await app.inject({ method: 'GET', url: '/api/v1/sessions/s2/turns?limit=0' });

    expect(res.statusCode).toBe(200);
    expect(res.json().count).toBe(1);
    expect(res.json().turns[0].sequenceNumber).toBe(3);
  });

  // ── DELETE routes ────────────────────────────────────────

  it('ends a known session with 204 and an unknown one with 404', async () => {
    await app.inject({ method: 'POST', url: '/api/v1/sessions/s1/turns', payload: { text: 'hello' } });

    const ended = await app.inject({ method: 'DELETE', url: '/api/v1/sessions/s1' });
    const unknown = await app.inject({ method: 'DELETE', url: '/api/v1/sessions/s1' });

    expect(ended.statusCode).toBe(204);
    expect(unknown.statusCode).toBe(404);
  });

  it('rejects cancellation of unknown turns and malformed ids', async () => {
    const unknown = await app.inject({ method: 'DELETE', url: '/api/v1/turns/3f1c2a9e-8a4b-4c7d-9e2f-1a2b3c4d5e6f' });
    const malformed = await app.inject({ method: 'DELETE', url: '/api/v1/turns/not-a-uuid' });

    expect(unknown.statusCode).toBe(404);
    expect(malformed.statusCode).toBe(400);
  });

  // ── GET /api/v1/health ───────────────────────────────────

  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: 'ok',
      started_at: '2026-02-18T12:00:00.000Z',
      store: { kind: 'memory', ok: true },
      bus: { closed: false, published: 0, pending: 0 },
      sessions: 0,
      turns_in_flight: 0,
    });
  });

  it('answers 503 when the store does not respond', async () => {
    vi.spyOn(assistant.memory, 'ping').mockRejectedValue(new Error('timeout'));

    const res = await app.inject({ method: 'GET', url: '/api/v1/health' });

    expect(res.statusCode).toBe(503);
    expect(res.json().status).toBe('degraded');
    expect(res.json().store).toEqual({ kind: 'memory', ok: false });
  });
});

describe('HTTP routes: cancelling an in-flight turn', () => {
  it('cancels a queued turn by its caller-supplied id', async () => {
    let open: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    const assistant = buildTestAssistant({
      backend: {
        name: 'gated',
        complete: async () => {
          await gate;
          return 'Nice weather indeed.';
        },
      },
    });
    const app = await buildServer(assistant);
    const turnId = '9d3f6c1a-2b4e-4a8d-8f0c-7e1b2a3c4d5e';

    const blocking = app.inject({ method: 'POST', url: '/api/v1/sessions/s1/turns', payload: { text: 'the weather is nice' } });
    await vi.waitFor(() => expect(assistant.orchestrator.inFlight).toBe(1));
    const queued = app.inject({ method: 'POST', url: '/api/v1/sessions/s1/turns', payload: { text: 'hello', turn_id: turnId } });
    await vi.waitFor(() => expect(assistant.orchestrator.inFlight).toBe(2));

    const cancel = await app.inject({ method: 'DELETE', url: `/api/v1/turns/${turnId}` });
    const reused = await app.inject({ method: 'POST', url: '/api/v1/sessions/s2/turns', payload: { text: 'hello', turn_id: turnId } });
    open();
    const [first, second] = await Promise.all([blocking, queued]);

    expect(cancel.statusCode).toBe(202);
    expect(cancel.json()).toEqual({ status: 'cancelling', turn_id: turnId, state: 'RECEIVED' });
    expect(reused.statusCode).toBe(409);
    expect(first.statusCode).toBe(200);
    expect(second.statusCode).toBe(409);
    expect(second.json().turnId).toBe(turnId);
    expect(second.json().error).toEqual({ kind: 'Cancelled', stage: 'RECEIVED', message: 'Turn cancelled' });

    await app.close();
  });
});

describe('statusForOutcome', () => {
  const base = {
    turnId: 't',
    sessionId: 's',
    state: 'FAILED',
    status: 'FAILED',
    responseText: RESPONSES.apology,
    intent: null,
    sequenceNumber: null,
    processingDurationMs: 0,
  } as const;

  it('maps failure kinds to HTTP statuses', () => {
    expect(statusForOutcome({ ...base, error: { kind: 'Timeout', stage: 'RESPONSE_GENERATED', message: 'x', systemError: true } })).toBe(504);
    expect(statusForOutcome({ ...base, error: { kind: 'Cancelled', stage: 'RECEIVED', message: 'x' } })).toBe(409);
    expect(statusForOutcome({ ...base, error: { kind: 'SystemError', stage: 'PUBLISHED', message: 'x' } })).toBe(500);
    expect(statusForOutcome({ ...base, status: 'DEGRADED', state: 'DEGRADED' })).toBe(200);
  });
});
