import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import type { AppConfig } from './infrastructure/index.js';
import { dbPlugin, storagePlugin } from './infrastructure/index.js';
import {
  authPlugin,
  errorHandlerPlugin,
  coordinatorPlugin,
  eventRoutes,
  attachmentRoutes,
  exportRoutes,
  healthRoutes,
} from './interfaces/http/index.js';

/**
 * Builds the Fastify application.
 *
 * Order:
 * 1) Cross-cutting plugins (errors, auth, multipart)
 * 2) Infrastructure (db, storage) and the attachment coordinator
 * 3) HTTP routes
 */
export async function buildServer(config: AppConfig): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.server.logLevel,
    },
  });

  // --------------------------------------------------
  // Cross-cutting
  // --------------------------------------------------

  await fastify.register(errorHandlerPlugin);
  await fastify.register(authPlugin, { token: config.auth.apiToken });
  await fastify.register(multipart, {
    // Oversized parts are truncated and flagged; the coordinator rejects them.
    throwFileSizeLimit: false,
    limits: {
      fileSize: config.attachments.maxFileBytes,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(dbPlugin, { databaseUrl: config.database.url });
  await fastify.register(storagePlugin, { config: config.storage });
  await fastify.register(coordinatorPlugin, { limits: config.attachments });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(healthRoutes);
  await fastify.register(eventRoutes);
  await fastify.register(attachmentRoutes);
  await fastify.register(exportRoutes);

  return fastify;
}
