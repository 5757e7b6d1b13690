import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { LifelogError, ValidationError } from '../../domain/index.js';
import type { ErrorCode } from '../../domain/index.js';

export const STATUS_BY_CODE: Record<ErrorCode, number> = {
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  QUOTA_EXCEEDED: 409,
  UNSUPPORTED_TYPE: 415,
  TOO_LARGE: 413,
  PERSISTENCE_ERROR: 500,
  STORAGE_ERROR: 502,
};

/**
 * Maps the domain error taxonomy onto HTTP responses.
 *
 * Body shape is always `{ error: { code, message, details? } }`.
 * Fastify's own client errors (bad JSON, wrong content type) keep their
 * status; anything else is a 500 with a generic message.
 */
async function errorHandlerPlugin(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((err, request, reply) => {
    if (err instanceof LifelogError) {
      const status = STATUS_BY_CODE[err.code];
      if (status >= 500) {
        request.log.error({ err }, err.message);
      }
      return reply.status(status).send({
        error: {
          code: err.code,
          message: err.message,
          ...(err instanceof ValidationError && err.issues.length > 0 ? { details: err.issues } : {}),
        },
      });
    }

    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.status(err.statusCode).send({
        error: { code: err.code, message: err.message },
      });
    }

    request.log.error({ err }, 'Unhandled error');
    return reply.status(500).send({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: { code: 'NOT_FOUND', message: `Route ${request.method} ${request.url} not found` },
    });
  });
}

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
  fastify: '5.x',
});
