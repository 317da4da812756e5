import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Assistant } from '../../assistant.js';

export interface AssistantPluginOptions {
  assistant: Assistant;
}

/**
 * Decorates `fastify.assistant` for the routes and shuts the core down
 * when the server closes.
 */
async function assistantPlugin(fastify: FastifyInstance, options: AssistantPluginOptions): Promise<void> {
  fastify.decorate('assistant', options.assistant);

  fastify.addHook('onClose', async () => {
    await options.assistant.shutdown('server closed');
  });
}

export default fp(assistantPlugin, {
  name: 'assistant',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.assistant` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    assistant: Assistant;
  }
}
