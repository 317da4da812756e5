import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import type { Assistant } from '../../assistant.js';
import assistantPlugin from './assistant-plugin.js';
import healthRoutes from './health-routes.js';
import sessionRoutes from './session-routes.js';
import turnRoutes from './turn-routes.js';

export interface ServerOptions {
  logger?: FastifyServerOptions['logger'];
}

/** Builds the HTTP server around an assistant. Does not listen. */
export async function buildServer(assistant: Assistant, options: ServerOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? false });

  await fastify.register(assistantPlugin, { assistant });
  await fastify.register(turnRoutes);
  await fastify.register(sessionRoutes);
  await fastify.register(healthRoutes);

  return fastify;
}
