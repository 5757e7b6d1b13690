import type { Database } from '../infrastructure/db/index.js';
import {
  insertEvent,
  findEventById,
  findAllEvents,
  patchEvent,
  deleteEventCascade,
  queryEvents,
} from '../infrastructure/db/index.js';
import type { EventChanges } from '../infrastructure/db/index.js';
import type { EventFilters, EventPage, EventRecord, SortOrder } from '../domain/index.js';
import { NotFoundError, ValidationError } from '../domain/index.js';
import type { CreateEventInput, EventPatch } from './event-schema.js';
import { PAGE_SIZE_DEFAULT, PAGE_SIZE_MAX } from './event-schema.js';
import type { PurgeResult } from './attachment-coordinator.js';

/** The part of the attachment coordinator that event deletion needs. */
export interface AttachmentPurger {
  purgeForEvent(keys: readonly string[]): Promise<PurgeResult>;
}

export interface ListEventsParams {
  q?: string;
  tags?: string[];
  start?: string;
  end?: string;
  sort?: SortOrder;
  page?: number;
  page_size?: number;
}

/** Tags are a set: duplicates collapse, first occurrence wins the position. */
function uniqueTags(tags: readonly string[] | null | undefined): string[] {
  return tags ? [...new Set(tags)] : [];
}

/**
 * Use case: create an event.
 * `timestamp` defaults to now when the caller does not supply one.
 */
export async function createEvent(db: Database, input: CreateEventInput): Promise<EventRecord> {
  return insertEvent(db, {
    title: input.title,
    description: input.description ?? null,
    tags: uniqueTags(input.tags),
    metadata: input.metadata ?? null,
    timestamp: input.timestamp !== undefined ? new Date(input.timestamp) : new Date(),
  });
}

/** Use case: fetch one event with attachments. */
export async function getEvent(db: Database, eventId: number): Promise<EventRecord> {
  const event = await findEventById(db, eventId);
  if (event === undefined) {
    throw new NotFoundError('Event', eventId);
  }
  return event;
}

function parseBound(name: 'start' | 'end', raw: string): Date {
  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`${name} is not a valid datetime`, [
      { path: [name], message: 'Must be a valid ISO-8601 datetime' },
    ]);
  }
  return date;
}

/**
 * Use case: list events with filters, sort and pagination.
 * Clamps page to >= 1 and page_size to [1, 200], defaulting to 25.
 */
export async function listEvents(db: Database, params: ListEventsParams): Promise<EventPage> {
  const page = Math.max(Math.trunc(params.page ?? 1), 1);
  const pageSize = Math.min(Math.max(Math.trunc(params.page_size ?? PAGE_SIZE_DEFAULT), 1), PAGE_SIZE_MAX);
  const sort = params.sort ?? 'newest';

  const filters: EventFilters = {};
  const text = params.q?.trim();
  if (text !== undefined && text !== '') filters.text = text;
  if (params.tags !== undefined && params.tags.length > 0) filters.tags = params.tags;
  if (params.start !== undefined) filters.start = parseBound('start', params.start);
  if (params.end !== undefined) filters.end = parseBound('end', params.end);
  if (filters.start !== undefined && filters.end !== undefined && filters.start > filters.end) {
    throw new ValidationError('start must not be after end', [
      { path: ['start'], message: 'start must not be after end' },
    ]);
  }

  const { items, total } = await queryEvents(db, filters, sort, {
    limit: pageSize,
    offset: (page - 1) * pageSize,
  });

  return { items, total, page, page_size: pageSize };
}

/**
 * Use case: partial update.
 *
 * Only keys present in the patch are written; `null` clears description
 * or metadata. An empty patch returns the event unchanged.
 */
export async function updateEvent(db: Database, eventId: number, patch: EventPatch): Promise<EventRecord> {
  const changes: EventChanges = {};
  if (patch.title !== undefined) changes.title = patch.title;
  if (patch.description !== undefined) changes.description = patch.description;
  if (patch.tags !== undefined) changes.tags = uniqueTags(patch.tags);
  if (patch.timestamp !== undefined) changes.timestamp = new Date(patch.timestamp);
  if (patch.metadata !== undefined) changes.metadata = patch.metadata;

  const event = await patchEvent(db, eventId, changes);
  if (event === undefined) {
    throw new NotFoundError('Event', eventId);
  }
  return event;
}

/**
 * Use case: delete an event and purge its stored objects.
 *
 * The metadata transaction commits first; objects are deleted only after
 * that, so no committed row ever points at a removed object.
 */
export async function deleteEvent(
  db: Database,
  purger: AttachmentPurger,
  eventId: number,
): Promise<PurgeResult> {
  const keys = await deleteEventCascade(db, eventId);
  if (keys === undefined) {
    throw new NotFoundError('Event', eventId);
  }
  return purger.purgeForEvent(keys);
}

/** Use case: dump every event with attachments, newest first. */
export async function exportEvents(db: Database): Promise<EventRecord[]> {
  return findAllEvents(db);
}
