import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { StorageConfig } from '../config.js';
import { createS3Client, S3StorageGateway } from './s3-storage-gateway.js';
import type { StorageGateway } from './storage-gateway.js';

export interface StoragePluginOptions {
  config: StorageConfig;
}

/**
 * Fastify plugin that owns the S3 client.
 *
 * Builds one gateway at startup, makes sure the bucket exists and
 * decorates `fastify.storage`. The client is destroyed on close.
 */
async function storagePlugin(fastify: FastifyInstance, opts: StoragePluginOptions): Promise<void> {
  const client = createS3Client(opts.config);
  const gateway = new S3StorageGateway(client, opts.config.bucket);

  const created = await gateway.ensureBucket();
  fastify.log.info(
    { bucket: gateway.bucket, created },
    created ? 'Storage bucket created' : 'Storage bucket ready',
  );

  fastify.decorate('storage', gateway);

  fastify.addHook('onClose', async () => {
    client.destroy();
    fastify.log.info('Storage client closed');
  });
}

export default fp(storagePlugin, {
  name: 'storage',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    storage: StorageGateway;
  }
}
