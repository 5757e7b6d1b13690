import type { BaseLogger } from 'pino';
import type { Database } from '../infrastructure/db/index.js';
import {
  eventExists,
  countAttachments,
  insertAttachments,
  findAttachmentByKey,
} from '../infrastructure/db/index.js';
import type { StorageGateway } from '../infrastructure/storage/index.js';
import type { AttachmentLimits } from '../infrastructure/config.js';
import type { Attachment } from '../domain/index.js';
import {
  NotFoundError,
  ValidationError,
  QuotaExceededError,
  UnsupportedTypeError,
  TooLargeError,
  PersistenceError,
} from '../domain/index.js';

/** One file of an upload batch, fully buffered. */
export interface UploadFile {
  filename: string;
  content_type: string;
  data: Buffer;
  /** The upload stream hit the byte cap, so `data` is cut short. */
  truncated?: boolean;
}

export interface PurgeResult {
  purged: string[];
  orphaned: string[];
}

export interface PresignedUrl {
  url: string;
  expires_in: number;
}

/** `Text/Plain; charset=utf-8` → `text/plain`. */
export function normalizeContentType(contentType: string): string {
  return (contentType.split(';')[0] ?? '').trim().toLowerCase();
}

/**
 * Keeps attachment metadata rows and stored objects in step.
 *
 * Uploads are validated as a whole before the first byte is stored,
 * then written object-by-object in input order and registered in one
 * transaction. Any failure after the first upload deletes what this
 * batch stored before the error reaches the caller.
 */
export class AttachmentCoordinator {
  constructor(
    private readonly db: Database,
    private readonly storage: StorageGateway,
    readonly limits: AttachmentLimits,
    private readonly log: BaseLogger,
  ) {}

  async uploadBatch(eventId: number, files: readonly UploadFile[]): Promise<Attachment[]> {
    if (files.length === 0) {
      throw new ValidationError('At least one file is required');
    }

    if (!(await eventExists(this.db, eventId))) {
      throw new NotFoundError('Event', eventId);
    }

    const existing = await countAttachments(this.db, eventId);
    if (existing + files.length > this.limits.maxPerEvent) {
      throw new QuotaExceededError(this.limits.maxPerEvent, existing, files.length);
    }

    const validated = files.map((file) => this.validate(file));

    const uploaded: Array<{ key: string; file: (typeof validated)[number] }> = [];
    try {
      for (const file of validated) {
        const key = await this.storage.put({
          body: file.data,
          filename: file.filename,
          contentType: file.content_type,
          size: file.size_bytes,
        });
        uploaded.push({ key, file });
      }
    } catch (err: unknown) {
      await this.compensate(eventId, uploaded.map((u) => u.key));
      throw err;
    }

    try {
      return await insertAttachments(this.db, uploaded.map(({ key, file }) => ({
        event_id: eventId,
        key,
        filename: file.filename,
        content_type: file.content_type,
        size_bytes: file.size_bytes,
      })));
    } catch (err: unknown) {
      this.log.error({ err, eventId }, 'Failed to save attachment metadata');
      await this.compensate(eventId, uploaded.map((u) => u.key));
      throw new PersistenceError('Failed to save attachment metadata', { cause: err });
    }
  }

  /**
   * Issues a time-limited download URL for a registered key.
   * Metadata is the source of truth: unknown keys are NotFound even if
   * the store still holds an object under that name.
   */
  async getPresignedUrl(key: string): Promise<PresignedUrl> {
    const attachment = await findAttachmentByKey(this.db, key);
    if (attachment === undefined) {
      throw new NotFoundError('Attachment', key);
    }

    const ttl = this.limits.presignTtlSeconds;
    const url = await this.storage.presignGet(key, ttl);
    return { url, expires_in: ttl };
  }

  /**
   * Deletes stored objects of an already-deleted event.
   * Never throws; keys that could not be deleted are reported as orphaned.
   */
  async purgeForEvent(keys: readonly string[]): Promise<PurgeResult> {
    const result: PurgeResult = { purged: [], orphaned: [] };

    for (const key of keys) {
      try {
        await this.storage.delete(key);
        result.purged.push(key);
      } catch (err: unknown) {
        this.log.warn({ err, key }, 'Failed to delete attachment object; left orphaned');
        result.orphaned.push(key);
      }
    }

    return result;
  }

  private validate(file: UploadFile): UploadFile & { size_bytes: number } {
    const contentType = normalizeContentType(file.content_type);
    if (!this.limits.allowedMimeTypes.includes(contentType)) {
      throw new UnsupportedTypeError(file.filename, file.content_type);
    }

    const size = file.data.byteLength;
    if (file.truncated === true || size > this.limits.maxFileBytes) {
      throw new TooLargeError(file.filename, this.limits.maxFileBytes);
    }

    return { filename: file.filename, content_type: contentType, data: file.data, size_bytes: size };
  }

  /** Best-effort removal of objects stored by a failed batch. */
  private async compensate(eventId: number, keys: readonly string[]): Promise<void> {
    for (const key of keys) {
      try {
        await this.storage.delete(key);
      } catch (err: unknown) {
        this.log.error({ err, eventId, key }, 'Compensating delete failed; object left orphaned');
      }
    }
  }
}
