import { and, or, ilike, gte, lte, asc, desc, arrayOverlaps, type SQL } from 'drizzle-orm';
import type { EventFilters, SortOrder } from '../../domain/index.js';
import { events } from './schema.js';

/**
 * Escapes LIKE metacharacters so the text filter is a literal substring
 * match. Postgres uses backslash as the default LIKE escape.
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Builds the WHERE predicate for event listing.
 *
 * Only non-undefined filters are applied; returns undefined when nothing
 * constrains the set. The count query and the page query must both use
 * the value returned here.
 */
export function buildEventFilter(filters: EventFilters): SQL | undefined {
  const conditions: SQL[] = [];

  const text = filters.text?.trim();
  if (text !== undefined && text !== '') {
    const pattern = `%${escapeLikePattern(text)}%`;
    const match = or(ilike(events.title, pattern), ilike(events.description, pattern));
    if (match !== undefined) conditions.push(match);
  }
  if (filters.tags !== undefined && filters.tags.length > 0) {
    conditions.push(arrayOverlaps(events.tags, filters.tags));
  }
  if (filters.start !== undefined) {
    conditions.push(gte(events.timestamp, filters.start));
  }
  if (filters.end !== undefined) {
    conditions.push(lte(events.timestamp, filters.end));
  }

  return conditions.length > 0 ? and(...conditions) : undefined;
}

/** Timestamp order with id as tie-breaker, in the same direction. */
export function buildEventOrder(sort: SortOrder): SQL[] {
  return sort === 'oldest'
    ? [asc(events.timestamp), asc(events.id)]
    : [desc(events.timestamp), desc(events.id)];
}
