export { events, attachments } from './schema.js';
export type { EventRow, NewEventRow, AttachmentRow, NewAttachmentRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export { ensureSchema } from './migrate.js';
export { buildEventFilter, buildEventOrder, escapeLikePattern } from './event-filter.js';
export {
  insertEvent,
  findEventById,
  findAllEvents,
  eventExists,
  patchEvent,
  deleteEventCascade,
} from './event-repository.js';
export type { EventChanges } from './event-repository.js';
export { queryEvents } from './event-query-repository.js';
export type { PaginationParams } from './event-query-repository.js';
export { countAttachments, insertAttachments, findAttachmentByKey } from './attachment-repository.js';
export type { NewAttachment } from './attachment-repository.js';
export { default as dbPlugin } from './db-plugin.js';
