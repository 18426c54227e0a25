import Fastify, { type FastifyInstance } from 'fastify';
import { VfsError } from '../errors.js';
import type { RemoteFs } from '../fs/remote-fs.js';
import { apiRoutes } from './api.js';

export async function registerRoutes(fastify: FastifyInstance, fs: RemoteFs): Promise<void> {
  await fastify.register(apiRoutes, { fs });
}

/**
 * Fastify instance with the API routes and the error mapping
 */
export async function createServer(fs: RemoteFs): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
  });

  fastify.setErrorHandler(async (error, request, reply) => {
    const status = error instanceof VfsError ? error.statusCode : error.statusCode ?? 500;
    if (status >= 500) {
      console.error(`[API] ${request.method} ${request.url} failed:`, error.message);
    }
    return reply.status(status).send({ error: error.message });
  });

  await registerRoutes(fastify, fs);

  // Health check endpoint
  fastify.get('/health', async (_request, reply) => {
    return reply.send({ status: 'ok' });
  });

  return fastify;
}
