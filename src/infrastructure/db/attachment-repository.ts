import { count, eq } from 'drizzle-orm';
import type { Attachment } from '../../domain/index.js';
import type { Database } from './client.js';
import { attachments } from './schema.js';
import type { NewAttachmentRow } from './schema.js';

export type NewAttachment = Pick<NewAttachmentRow, 'event_id' | 'key' | 'filename' | 'content_type' | 'size_bytes'>;

export async function countAttachments(db: Database, eventId: number): Promise<number> {
  const [row] = await db
    .select({ total: count() })
    .from(attachments)
    .where(eq(attachments.event_id, eventId));

  return row?.total ?? 0;
}

/**
 * Inserts all rows of an upload batch in one transaction.
 * Either every row is committed or none is.
 */
export async function insertAttachments(
  db: Database,
  rows: NewAttachment[],
): Promise<Attachment[]> {
  return db.transaction(async (tx) => tx.insert(attachments).values(rows).returning());
}

/**
 * Looks up an attachment by storage key.
 * Returns undefined if no row references the key.
 */
export async function findAttachmentByKey(
  db: Database,
  key: string,
): Promise<Attachment | undefined> {
  const rows = await db
    .select()
    .from(attachments)
    .where(eq(attachments.key, key))
    .limit(1);

  return rows[0];
}
