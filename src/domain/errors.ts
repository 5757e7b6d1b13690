/**
 * Error taxonomy shared by every layer.
 *
 * Each class carries a stable `code` that the HTTP layer maps to a status.
 * Validation, quota and not-found errors are raised before any side effect;
 * PersistenceError means storage writes happened and were rolled back;
 * TransientStorageError wraps an object-store failure.
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'QUOTA_EXCEEDED'
  | 'UNSUPPORTED_TYPE'
  | 'TOO_LARGE'
  | 'PERSISTENCE_ERROR'
  | 'STORAGE_ERROR';

export abstract class LifelogError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends LifelogError {
  readonly code = 'NOT_FOUND';

  constructor(resource: 'Event' | 'Attachment', id: number | string) {
    super(`${resource} ${id} not found`);
  }
}

export interface ValidationIssue {
  path: (string | number)[];
  message: string;
}

export class ValidationError extends LifelogError {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string, readonly issues: ValidationIssue[] = []) {
    super(message);
  }
}

export class QuotaExceededError extends LifelogError {
  readonly code = 'QUOTA_EXCEEDED';

  constructor(readonly limit: number, readonly existing: number, readonly requested: number) {
    super(
      `Too many attachments: event has ${existing}, batch adds ${requested}, max allowed per event is ${limit}`,
    );
  }
}

export class UnsupportedTypeError extends LifelogError {
  readonly code = 'UNSUPPORTED_TYPE';

  constructor(readonly filename: string, readonly contentType: string) {
    super(`File type ${contentType} of ${filename} is not allowed`);
  }
}

export class TooLargeError extends LifelogError {
  readonly code = 'TOO_LARGE';

  constructor(readonly filename: string, readonly maxBytes: number) {
    super(`File ${filename} exceeds max size of ${maxBytes} bytes`);
  }
}

export class PersistenceError extends LifelogError {
  readonly code = 'PERSISTENCE_ERROR';
}

export class TransientStorageError extends LifelogError {
  readonly code = 'STORAGE_ERROR';
}
