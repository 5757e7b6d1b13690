import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';

export const APP_NAME = 'Lifelog';

/** GET /health — liveness probe, no auth. */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/health', async () => ({ status: 'ok', app: APP_NAME }));
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
