export type {
  Attachment,
  EventRecord,
  EventMetadata,
  EventFilters,
  EventPage,
  SortOrder,
} from './event.js';
export {
  LifelogError,
  NotFoundError,
  ValidationError,
  QuotaExceededError,
  UnsupportedTypeError,
  TooLargeError,
  PersistenceError,
  TransientStorageError,
} from './errors.js';
export type { ErrorCode, ValidationIssue } from './errors.js';
