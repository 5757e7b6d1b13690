import { z } from 'zod';
import { ValidationError } from '../domain/index.js';

export const TITLE_MAX_LENGTH = 255;
export const DESCRIPTION_MAX_LENGTH = 10_000;
export const TAG_MAX_LENGTH = 64;
export const TAGS_MAX_COUNT = 50;
export const PAGE_SIZE_MAX = 200;
export const PAGE_SIZE_DEFAULT = 25;

const isoDateTime = z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' });

const tagList = z
  .array(z.string().trim().min(1).max(TAG_MAX_LENGTH))
  .max(TAGS_MAX_COUNT);

const metadataDocument = z.record(z.string(), z.unknown());

/**
 * Schema for POST /api/events.
 *
 * Only `title` is required. `timestamp` defaults to the creation time in
 * the use case, not here, so the schema stays free of clock reads.
 */
export const createEventSchema = z.object({
  title: z.string().trim().min(1).max(TITLE_MAX_LENGTH),
  description: z.string().max(DESCRIPTION_MAX_LENGTH).nullable().optional(),
  tags: tagList.nullable().optional(),
  timestamp: isoDateTime.optional(),
  metadata: metadataDocument.nullable().optional(),
}).strict();

export type CreateEventInput = z.infer<typeof createEventSchema>;

/**
 * Schema for PATCH /api/events/:event_id.
 *
 * A key that is absent leaves the column untouched. `null` clears the
 * nullable columns (description, metadata). `tags: []` empties the tag
 * set, while an absent `tags` key keeps it. Title and timestamp cannot
 * be cleared. An empty object is a valid no-op.
 */
export const patchEventSchema = z.object({
  title: z.string().trim().min(1).max(TITLE_MAX_LENGTH).optional(),
  description: z.string().max(DESCRIPTION_MAX_LENGTH).nullable().optional(),
  tags: tagList.optional(),
  timestamp: isoDateTime.optional(),
  metadata: metadataDocument.nullable().optional(),
}).strict();

export type EventPatch = z.infer<typeof patchEventSchema>;

/** Splits a comma-separated tag list, dropping blanks. */
export function parseTagList(raw: string): string[] {
  return raw.split(',').map((t) => t.trim()).filter((t) => t !== '');
}

/**
 * Schema for GET /api/events query parameters.
 * `tags` arrives comma-separated; `start`/`end` are inclusive bounds.
 */
export const listEventsQuerySchema = z.object({
  q: z.string().max(TITLE_MAX_LENGTH).optional(),
  tags: z.string().optional().transform((raw) => {
    if (raw === undefined) return undefined;
    const tags = parseTagList(raw);
    return tags.length > 0 ? tags : undefined;
  }),
  start: isoDateTime.optional(),
  end: isoDateTime.optional(),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(PAGE_SIZE_MAX).default(PAGE_SIZE_DEFAULT),
  sort: z.enum(['newest', 'oldest']).default('newest'),
}).refine(
  (q) => q.start === undefined || q.end === undefined || Date.parse(q.start) <= Date.parse(q.end),
  { message: 'start must not be after end', path: ['start'] },
);

export type ListEventsQuery = z.infer<typeof listEventsQuerySchema>;

/** Event ids are positive bigserial values. */
export const eventIdSchema = z.coerce.number().int().positive().max(Number.MAX_SAFE_INTEGER);

export const attachmentKeySchema = z.string().min(1).max(255);

/**
 * Parses `value` with `schema`, raising ValidationError with the zod
 * issues when it does not conform.
 */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  message = 'Validation failed',
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    );
  }
  return parsed.data;
}
