import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { exportEvents } from '../../application/index.js';

/**
 * GET /api/export — every event with attachment metadata, newest first.
 * Served as a download.
 */
async function exportRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/export',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const events = await exportEvents(fastify.db);
      const stamp = new Date().toISOString().slice(0, 10);

      return reply
        .status(200)
        .header('Content-Disposition', `attachment; filename="lifelog-export-${stamp}.json"`)
        .send(events);
    },
  );
}

export default fp(exportRoutes, {
  name: 'export-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
