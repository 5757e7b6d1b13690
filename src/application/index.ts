export {
  createEventSchema,
  patchEventSchema,
  listEventsQuerySchema,
  eventIdSchema,
  attachmentKeySchema,
  parseOrThrow,
  parseTagList,
} from './event-schema.js';
export type { CreateEventInput, EventPatch, ListEventsQuery } from './event-schema.js';
export {
  createEvent,
  getEvent,
  listEvents,
  updateEvent,
  deleteEvent,
  exportEvents,
} from './event-crud.js';
export type { AttachmentPurger, ListEventsParams } from './event-crud.js';
export { AttachmentCoordinator, normalizeContentType } from './attachment-coordinator.js';
export type { UploadFile, PurgeResult, PresignedUrl } from './attachment-coordinator.js';
