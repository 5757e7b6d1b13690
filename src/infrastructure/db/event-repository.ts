import { asc, eq } from 'drizzle-orm';
import type { EventRecord } from '../../domain/index.js';
import type { Database } from './client.js';
import { events, attachments } from './schema.js';
import type { NewEventRow } from './schema.js';
import { buildEventOrder } from './event-filter.js';

/** Columns a partial update may touch. Absent keys are left untouched. */
export type EventChanges = Partial<Pick<NewEventRow, 'title' | 'description' | 'tags' | 'metadata' | 'timestamp'>>;

/**
 * Inserts an event and returns it with an empty attachment list.
 */
export async function insertEvent(
  db: Database,
  values: Pick<NewEventRow, 'title' | 'description' | 'tags' | 'metadata' | 'timestamp'>,
): Promise<EventRecord> {
  const [row] = await db.insert(events).values(values).returning();
  if (row === undefined) {
    throw new Error('INSERT ... RETURNING produced no row');
  }
  return { ...row, attachments: [] };
}

/**
 * Fetches a single event with its attachments, oldest upload first.
 * Returns undefined if not found.
 */
export async function findEventById(
  db: Database,
  eventId: number,
): Promise<EventRecord | undefined> {
  return db.query.events.findFirst({
    where: eq(events.id, eventId),
    with: {
      attachments: { orderBy: [asc(attachments.uploaded_at), asc(attachments.id)] },
    },
  });
}

/** All events with attachments, newest first. Used by export. */
export async function findAllEvents(db: Database): Promise<EventRecord[]> {
  return db.query.events.findMany({
    orderBy: buildEventOrder('newest'),
    with: {
      attachments: { orderBy: [asc(attachments.uploaded_at), asc(attachments.id)] },
    },
  });
}

export async function eventExists(db: Database, eventId: number): Promise<boolean> {
  const rows = await db
    .select({ id: events.id })
    .from(events)
    .where(eq(events.id, eventId))
    .limit(1);

  return rows.length > 0;
}

/**
 * Applies the given changes and re-reads the event in one transaction.
 *
 * An empty change set skips the UPDATE and returns the current row.
 * Returns undefined if the event does not exist.
 */
export async function patchEvent(
  db: Database,
  eventId: number,
  changes: EventChanges,
): Promise<EventRecord | undefined> {
  return db.transaction(async (tx) => {
    if (Object.keys(changes).length > 0) {
      const updated = await tx
        .update(events)
        .set(changes)
        .where(eq(events.id, eventId))
        .returning({ id: events.id });

      if (updated.length === 0) return undefined;
    }

    return tx.query.events.findFirst({
      where: eq(events.id, eventId),
      with: {
        attachments: { orderBy: [asc(attachments.uploaded_at), asc(attachments.id)] },
      },
    });
  });
}

/**
 * Deletes an event; its attachment rows go with it via ON DELETE CASCADE.
 *
 * Returns the storage keys that belonged to the event so the caller can
 * purge the objects after commit, or undefined if the event did not exist.
 */
export async function deleteEventCascade(
  db: Database,
  eventId: number,
): Promise<string[] | undefined> {
  return db.transaction(async (tx) => {
    const owned = await tx
      .select({ key: attachments.key })
      .from(attachments)
      .where(eq(attachments.event_id, eventId));

    const deleted = await tx
      .delete(events)
      .where(eq(events.id, eventId))
      .returning({ id: events.id });

    if (deleted.length === 0) return undefined;
    return owned.map((a) => a.key);
  });
}
