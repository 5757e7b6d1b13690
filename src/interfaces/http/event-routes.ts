import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  createEventSchema,
  patchEventSchema,
  listEventsQuerySchema,
  eventIdSchema,
  parseOrThrow,
  createEvent,
  getEvent,
  listEvents,
  updateEvent,
  deleteEvent,
} from '../../application/index.js';

type EventParams = { Params: { event_id: string } };

function parseEventId(raw: string): number {
  return parseOrThrow(eventIdSchema, raw, 'event_id must be a positive integer');
}

/**
 * Event CRUD and search routes.
 *
 * POST   /api/events            — create event
 * GET    /api/events            — filtered, paginated list
 * GET    /api/events/:event_id  — single event with attachments
 * PATCH  /api/events/:event_id  — partial update
 * DELETE /api/events/:event_id  — delete event, attachments and stored objects
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /api/events ─────────────────────────────────────
  fastify.post(
    '/api/events',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const input = parseOrThrow(createEventSchema, request.body);
      const event = await createEvent(fastify.db, input);
      return reply.status(201).send(event);
    },
  );

  // ── GET /api/events ──────────────────────────────────────
  fastify.get(
    '/api/events',
    async (request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const q = parseOrThrow(listEventsQuerySchema, request.query, 'Invalid query parameters');

      const result = await listEvents(fastify.db, {
        q: q.q,
        tags: q.tags,
        start: q.start,
        end: q.end,
        sort: q.sort,
        page: q.page,
        page_size: q.page_size,
      });

      return reply.status(200).send(result);
    },
  );

  // ── GET /api/events/:event_id ────────────────────────────
  fastify.get(
    '/api/events/:event_id',
    async (request: FastifyRequest<EventParams>, reply: FastifyReply) => {
      const event = await getEvent(fastify.db, parseEventId(request.params.event_id));
      return reply.status(200).send(event);
    },
  );

  // ── PATCH /api/events/:event_id ──────────────────────────
  fastify.patch(
    '/api/events/:event_id',
    async (request: FastifyRequest<EventParams & { Body: unknown }>, reply: FastifyReply) => {
      const eventId = parseEventId(request.params.event_id);
      const patch = parseOrThrow(patchEventSchema, request.body ?? {});
      const event = await updateEvent(fastify.db, eventId, patch);
      return reply.status(200).send(event);
    },
  );

  // ── DELETE /api/events/:event_id ─────────────────────────
  fastify.delete(
    '/api/events/:event_id',
    async (request: FastifyRequest<EventParams>, reply: FastifyReply) => {
      const eventId = parseEventId(request.params.event_id);
      const { purged, orphaned } = await deleteEvent(fastify.db, fastify.attachments, eventId);

      if (orphaned.length > 0) {
        request.log.warn(
          { eventId, purged: purged.length, orphaned },
          'Event deleted; some stored objects could not be removed',
        );
      }

      return reply.status(204).send();
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['db', 'attachments'],
  fastify: '5.x',
});
