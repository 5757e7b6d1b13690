import { asc, count } from 'drizzle-orm';
import type { EventFilters, EventRecord, SortOrder } from '../../domain/index.js';
import type { Database } from './client.js';
import { events, attachments } from './schema.js';
import { buildEventFilter, buildEventOrder } from './event-filter.js';

export interface PaginationParams {
  limit: number;
  offset: number;
}

/**
 * Fetches one page of filtered events plus the filtered total.
 *
 * Both queries share a single predicate and run in one read-only
 * REPEATABLE READ transaction, so `total` and `items` describe the
 * same snapshot.
 */
export async function queryEvents(
  db: Database,
  filters: EventFilters,
  sort: SortOrder,
  pagination: PaginationParams,
): Promise<{ items: EventRecord[]; total: number }> {
  const whereClause = buildEventFilter(filters);

  return db.transaction(async (tx) => {
    const [counted] = await tx
      .select({ total: count() })
      .from(events)
      .where(whereClause);

    const items = await tx.query.events.findMany({
      where: whereClause,
      orderBy: buildEventOrder(sort),
      limit: pagination.limit,
      offset: pagination.offset,
      with: {
        attachments: {
          orderBy: [asc(attachments.uploaded_at), asc(attachments.id)],
        },
      },
    });

    return { items, total: counted?.total ?? 0 };
  }, { isolationLevel: 'repeatable read', accessMode: 'read only' });
}
