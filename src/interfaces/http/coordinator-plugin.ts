import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { AttachmentCoordinator } from '../../application/index.js';
import type { AttachmentLimits } from '../../infrastructure/config.js';

export interface CoordinatorPluginOptions {
  limits: AttachmentLimits;
}

/**
 * Builds the single AttachmentCoordinator from the db handle and the
 * storage gateway registered by the infrastructure plugins.
 */
async function coordinatorPlugin(fastify: FastifyInstance, opts: CoordinatorPluginOptions): Promise<void> {
  fastify.decorate(
    'attachments',
    new AttachmentCoordinator(fastify.db, fastify.storage, opts.limits, fastify.log),
  );
}

export default fp(coordinatorPlugin, {
  name: 'attachments',
  dependencies: ['db', 'storage'],
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    attachments: AttachmentCoordinator;
  }
}
