/**
 * Core domain types for the Lifelog event model.
 *
 * These types define the canonical shape of an event and its
 * attachments as returned by every use case. They carry no
 * framework dependencies.
 */

/** Free-form key/value document attached to an event. */
export type EventMetadata = Record<string, unknown>;

/**
 * A file stored in the object store and tracked by one metadata row.
 *
 * `key` is the object-store handle, generated at upload time and never
 * reused; `filename` is whatever the client sent.
 */
export interface Attachment {
  readonly id: number;
  readonly event_id: number;
  readonly key: string;
  readonly filename: string;
  readonly content_type: string;
  readonly size_bytes: number;
  readonly uploaded_at: Date;
}

/**
 * Canonical Event entity.
 *
 * `created_at` is set by the database on insert; `timestamp` is the
 * user-assignable logical time of the event.
 */
export interface EventRecord {
  readonly id: number;
  readonly created_at: Date;
  readonly timestamp: Date;
  readonly title: string;
  readonly description: string | null;
  readonly tags: string[];
  readonly metadata: EventMetadata | null;
  readonly attachments: Attachment[];
}

export type SortOrder = 'newest' | 'oldest';

/** Filter predicate for event listing. Absent fields do not constrain. */
export interface EventFilters {
  text?: string;
  tags?: string[];
  start?: Date;   // inclusive
  end?: Date;     // inclusive
}

export interface EventPage {
  items: EventRecord[];
  total: number;
  page: number;
  page_size: number;
}
