import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { MultipartFile } from '@fastify/multipart';
import {
  eventIdSchema,
  attachmentKeySchema,
  parseOrThrow,
} from '../../application/index.js';
import type { UploadFile } from '../../application/index.js';

/**
 * Buffers one part. With `throwFileSizeLimit: false` an oversized part is
 * cut at the limit and flagged, so the coordinator reports it in order.
 */
async function bufferPart(part: MultipartFile): Promise<UploadFile> {
  const data = await part.toBuffer();
  return {
    filename: part.filename,
    content_type: part.mimetype,
    data,
    truncated: part.file.truncated,
  };
}

/**
 * Attachment routes.
 *
 * POST /api/events/:event_id/attachments — multipart upload, one or more files
 * GET  /api/attachments/:key             — presigned download URL
 */
async function attachmentRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/events/:event_id/attachments',
    async (
      request: FastifyRequest<{ Params: { event_id: string } }>,
      reply: FastifyReply,
    ) => {
      const eventId = parseOrThrow(eventIdSchema, request.params.event_id, 'event_id must be a positive integer');

      // Parts must be consumed in order; the batch is validated as a whole afterwards.
      const files: UploadFile[] = [];
      for await (const part of request.files()) {
        files.push(await bufferPart(part));
      }

      const created = await fastify.attachments.uploadBatch(eventId, files);
      return reply.status(201).send(created);
    },
  );

  fastify.get(
    '/api/attachments/:key',
    async (
      request: FastifyRequest<{ Params: { key: string } }>,
      reply: FastifyReply,
    ) => {
      const key = parseOrThrow(attachmentKeySchema, request.params.key, 'Invalid attachment key');
      const presigned = await fastify.attachments.getPresignedUrl(key);
      return reply.status(200).send(presigned);
    },
  );
}

export default fp(attachmentRoutes, {
  name: 'attachment-routes',
  dependencies: ['attachments'],
  fastify: '5.x',
});
