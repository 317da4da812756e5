import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  historyQuerySchema,
  sessionParamsSchema,
  submitTurnBodySchema,
  turnParamsSchema,
} from '../../application/index.js';
import { DuplicateTurnError, type TurnOutcome } from '../../domain/index.js';

/** FAILED outcomes map to an HTTP status by error kind. */
export function statusForOutcome(outcome: TurnOutcome): number {
  if (outcome.status !== 'FAILED') return 200;

  switch (outcome.error?.kind) {
    case 'PolicyViolation':
      return 422;
    case 'Timeout':
      return 504;
    case 'Cancelled':
      return 409;
    default:
      return 500;
  }
}

/**
 * Turn routes.
 *
 * POST   /api/v1/sessions/:session_id/turns : run a turn to completion
 * GET    /api/v1/sessions/:session_id/turns : persisted history, most recent first
 * DELETE /api/v1/turns/:turn_id             : cancel an in-flight turn
 */
async function turnRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /api/v1/sessions/:session_id/turns ──────────────
  fastify.post(
    '/api/v1/sessions/:session_id/turns',
    async (
      request: FastifyRequest<{ Params: { session_id: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const params = sessionParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: params.error.flatten() });
      }

      const body = submitTurnBodySchema.safeParse(request.body);
      if (!body.success) {
        return reply.status(400).send({ error: body.error.flatten() });
      }

      let outcome: TurnOutcome;
      try {
        outcome = await fastify.assistant.orchestrator.submitTurn(
          params.data.session_id,
          body.data.text,
          { turnId: body.data.turn_id, timeoutMs: body.data.timeout_ms, metadata: body.data.metadata },
        );
      } catch (err: unknown) {
        if (err instanceof DuplicateTurnError) {
          return reply.status(409).send({ error: err.message, turn_id: err.turnId });
        }
        throw err;
      }

      return reply.status(statusForOutcome(outcome)).send(outcome);
    },
  );

  // ── GET /api/v1/sessions/:session_id/turns ───────────────
  fastify.get(
    '/api/v1/sessions/:session_id/turns',
    async (
      request: FastifyRequest<{ Params: { session_id: string }; Querystring: unknown }>,
      reply: FastifyReply,
    ) => {
      const params = sessionParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: params.error.flatten() });
      }

      const query = historyQuerySchema.safeParse(request.query);
      if (!query.success) {
        return reply.status(400).send({ error: query.error.flatten() });
      }

      const turns = await fastify.assistant.store.query(params.data.session_id, query.data.limit);
      return reply.status(200).send({
        session_id: params.data.session_id,
        count: turns.length,
        turns,
      });
    },
  );

  // ── DELETE /api/v1/turns/:turn_id ────────────────────────
  fastify.delete(
    '/api/v1/turns/:turn_id',
    async (
      request: FastifyRequest<{ Params: { turn_id: string } }>,
      reply: FastifyReply,
    ) => {
      const params = turnParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: params.error.flatten() });
      }

      const result = fastify.assistant.orchestrator.cancelTurn(params.data.turn_id);
      if (result.ok) {
        return reply.status(202).send({ status: 'cancelling', turn_id: result.turnId, state: result.state });
      }
      if (result.error === 'NotFound') {
        return reply.status(404).send({ error: 'Turn not found or already finished' });
      }
      return reply.status(409).send({
        error: 'Turn can no longer be cancelled',
        turn_id: result.turnId,
        state: result.state,
      });
    },
  );
}

export default fp(turnRoutes, {
  name: 'turn-routes',
  fastify: '5.x',
  dependencies: ['assistant'],
});
