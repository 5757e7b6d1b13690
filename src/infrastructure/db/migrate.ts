import type { SqlClient } from './client.js';

/**
 * Creates the tables and indexes if they do not exist yet.
 *
 * drizzle-kit generates real migrations from schema.ts; this keeps a
 * fresh local database usable on first start. Every statement is
 * idempotent.
 */
export async function ensureSchema(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS events (
      id           BIGSERIAL    PRIMARY KEY,
      created_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      timestamp    TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      title        VARCHAR(255) NOT NULL,
      description  TEXT,
      tags         TEXT[]       NOT NULL DEFAULT '{}',
      metadata     JSONB
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS attachments (
      id            BIGSERIAL    PRIMARY KEY,
      event_id      BIGINT       NOT NULL REFERENCES events (id) ON DELETE CASCADE,
      key           TEXT         NOT NULL UNIQUE,
      filename      TEXT         NOT NULL,
      content_type  VARCHAR(255) NOT NULL,
      size_bytes    BIGINT       NOT NULL,
      uploaded_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_events_timestamp ON events (timestamp)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_events_tags ON events USING gin (tags)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_attachments_event_id ON attachments (event_id)`);
}
