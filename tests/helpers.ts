import { vi } from 'vitest';
import { TransientStorageError } from '../src/domain/index.js';
import type { Attachment, EventRecord } from '../src/domain/index.js';
import type { AttachmentLimits } from '../src/infrastructure/config.js';
import type { PutObjectInput, StorageGateway } from '../src/infrastructure/storage/index.js';

/** Fixed "now" for rows whose timestamps do not matter to the assertion. */
export const FIXED_NOW = new Date('2026-03-01T12:00:00Z');

export const TEST_LIMITS: AttachmentLimits = {
  maxFileBytes: 1024,
  maxPerEvent: 3,
  allowedMimeTypes: ['text/plain', 'image/png'],
  presignTtlSeconds: 900,
};

/** Minimal fake pino logger. */
export function fakeLogger() {
  return {
    level: 'info',
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
  };
}

/**
 * Factory for event records with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<EventRecord> = {}): EventRecord {
  return {
    id: 1,
    created_at: FIXED_NOW,
    timestamp: FIXED_NOW,
    title: 'Morning run',
    description: null,
    tags: [],
    metadata: null,
    attachments: [],
    ...overrides,
  };
}

export function makeAttachment(overrides: Partial<Attachment> = {}): Attachment {
  return {
    id: 1,
    event_id: 1,
    key: 'key-1',
    filename: 'note.txt',
    content_type: 'text/plain',
    size_bytes: 100,
    uploaded_at: FIXED_NOW,
    ...overrides,
  };
}

/**
 * In-process StorageGateway keeping objects in a Map.
 *
 * Keys are `key-1`, `key-2`, ... in put order so tests can name them.
 * Failures are injected per call number (put) or per key (delete).
 */
export class InMemoryStorageGateway implements StorageGateway {
  readonly objects = new Map<string, { body: Buffer; contentType: string }>();
  readonly deleted: string[] = [];

  /** 1-based put call that should fail, if any. */
  failPutOnCall: number | null = null;
  failDeleteFor = new Set<string>();
  failAllDeletes = false;

  putCalls = 0;
  private counter = 0;

  async put(input: PutObjectInput): Promise<string> {
    this.putCalls++;
    if (this.failPutOnCall === this.putCalls) {
      throw new TransientStorageError(`simulated put failure for ${input.filename}`);
    }

    this.counter++;
    const key = `key-${this.counter}`;
    this.objects.set(key, { body: input.body, contentType: input.contentType });
    return key;
  }

  async presignGet(key: string, ttlSeconds: number): Promise<string> {
    return `https://storage.test/${key}?ttl=${ttlSeconds}`;
  }

  async delete(key: string): Promise<void> {
    if (this.failAllDeletes || this.failDeleteFor.has(key)) {
      throw new TransientStorageError(`simulated delete failure for ${key}`);
    }
    this.objects.delete(key);
    this.deleted.push(key);
  }
}
