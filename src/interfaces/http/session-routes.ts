import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { sessionParamsSchema } from '../../application/index.js';

/**
 * Session routes.
 *
 * DELETE /api/v1/sessions/:session_id: end the session, dropping its context
 */
async function sessionRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.delete(
    '/api/v1/sessions/:session_id',
    async (
      request: FastifyRequest<{ Params: { session_id: string } }>,
      reply: FastifyReply,
    ) => {
      const params = sessionParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: params.error.flatten() });
      }

      const ended = await fastify.assistant.orchestrator.endSession(params.data.session_id);
      if (!ended) {
        return reply.status(404).send({ error: 'Session not found' });
      }
      return reply.status(204).send();
    },
  );
}

export default fp(sessionRoutes, {
  name: 'session-routes',
  fastify: '5.x',
  dependencies: ['assistant'],
});
