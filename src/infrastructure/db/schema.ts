import { sql, relations } from 'drizzle-orm';
import {
  pgTable,
  bigserial,
  bigint,
  varchar,
  text,
  timestamp,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';
import type { EventMetadata } from '../../domain/index.js';

/**
 * Drizzle schema for the `events` table.
 *
 * `id` is a bigserial so later events always sort after earlier ones
 * on ties. `tags` is never NULL: an untagged event stores '{}'.
 */
export const events = pgTable('events', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  timestamp: timestamp('timestamp', { withTimezone: true }).notNull().defaultNow(),
  title: varchar('title', { length: 255 }).notNull(),
  description: text('description'),
  tags: text('tags').array().notNull().default(sql`'{}'::text[]`),
  metadata: jsonb('metadata').$type<EventMetadata>(),
}, (table) => [
  index('idx_events_timestamp').on(table.timestamp),
  index('idx_events_tags').using('gin', table.tags),
]);

/**
 * Drizzle schema for the `attachments` table.
 *
 * The FK cascades, so deleting an event removes its rows in the same
 * statement. `key` is unique: one row per stored object.
 */
export const attachments = pgTable('attachments', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  event_id: bigint('event_id', { mode: 'number' })
    .notNull()
    .references(() => events.id, { onDelete: 'cascade' }),
  key: text('key').notNull().unique(),
  filename: text('filename').notNull(),
  content_type: varchar('content_type', { length: 255 }).notNull(),
  size_bytes: bigint('size_bytes', { mode: 'number' }).notNull(),
  uploaded_at: timestamp('uploaded_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_attachments_event_id').on(table.event_id),
]);

export const eventsRelations = relations(events, ({ many }) => ({
  attachments: many(attachments),
}));

export const attachmentsRelations = relations(attachments, ({ one }) => ({
  event: one(events, {
    fields: [attachments.event_id],
    references: [events.id],
  }),
}));

export type EventRow = typeof events.$inferSelect;
export type NewEventRow = typeof events.$inferInsert;
export type AttachmentRow = typeof attachments.$inferSelect;
export type NewAttachmentRow = typeof attachments.$inferInsert;
