import Fastify from 'fastify';
import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import multipart from '@fastify/multipart';
import { AttachmentCoordinator } from '../../src/application/index.js';
import type { Database } from '../../src/infrastructure/db/index.js';
import { errorHandlerPlugin } from '../../src/interfaces/http/index.js';
import { InMemoryStorageGateway, TEST_LIMITS, fakeLogger } from '../helpers.js';

const BOUNDARY = '----lifelog-test-boundary';

export const multipartHeaders = { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` };

export interface MultipartPart {
  field: string;
  filename: string;
  contentType: string;
  content: string;
}

/** Encodes file parts as a multipart/form-data body. */
export function multipartBody(parts: MultipartPart[]): string {
  const chunks = parts.map((p) =>
    `--${BOUNDARY}\r\n`
    + `Content-Disposition: form-data; name="${p.field}"; filename="${p.filename}"\r\n`
    + `Content-Type: ${p.contentType}\r\n\r\n`
    + `${p.content}\r\n`,
  );
  return `${chunks.join('')}--${BOUNDARY}--\r\n`;
}

export interface TestApp {
  app: FastifyInstance;
  db: Database;
  coordinator: AttachmentCoordinator;
  storage: InMemoryStorageGateway;
}

/**
 * Builds a Fastify instance wired like the real server, with the
 * database replaced by an empty handle and storage kept in memory.
 * Route plugins under test are registered on top.
 */
export async function buildTestApp(...routes: FastifyPluginAsync[]): Promise<TestApp> {
  const db = {} as Database;
  const storage = new InMemoryStorageGateway();
  const coordinator = new AttachmentCoordinator(db, storage, TEST_LIMITS, fakeLogger());

  const app = Fastify({ logger: false });
  await app.register(errorHandlerPlugin);
  await app.register(multipart, {
    throwFileSizeLimit: false,
    limits: { fileSize: TEST_LIMITS.maxFileBytes },
  });
  await app.register(fp(async (f) => { f.decorate('db', db); }, { name: 'db' }));
  await app.register(fp(async (f) => { f.decorate('attachments', coordinator); }, { name: 'attachments' }));

  for (const route of routes) {
    await app.register(route);
  }
  await app.ready();

  return { app, db, coordinator, storage };
}
