import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /api/v1/health: store reachability plus bus and orchestrator gauges.
 * Answers 503 when the durable store does not respond.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { assistant } = fastify;

      let storeOk = false;
      try {
        storeOk = await assistant.store.ping();
      } catch (err: unknown) {
        fastify.log.warn({ err }, 'Durable store health check failed');
      }

      const bus = assistant.bus.stats();
      const pending = bus.topics
        .flatMap((t) => t.subscribers)
        .reduce((sum, s) => sum + s.pending, 0);

      return reply.status(storeOk ? 200 : 503).send({
        status: storeOk ? 'ok' : 'degraded',
        started_at: assistant.startedAt,
        store: { kind: assistant.store.kind, ok: storeOk },
        bus: { closed: bus.closed, published: bus.published, pending },
        sessions: assistant.contexts.size,
        turns_in_flight: assistant.orchestrator.inFlight,
      });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
  dependencies: ['assistant'],
});
