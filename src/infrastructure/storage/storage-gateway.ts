import { randomUUID } from 'node:crypto';
import { extname } from 'node:path';

export interface PutObjectInput {
  body: Buffer;
  filename: string;
  contentType: string;
  size: number;
}

/**
 * Object-store capabilities the application relies on.
 *
 * Implementations are stateless with respect to callers and never retry:
 * every failure surfaces as a TransientStorageError and the caller decides
 * whether to compensate.
 */
export interface StorageGateway {
  /** Stores the bytes under a freshly generated key and returns that key. */
  put(input: PutObjectInput): Promise<string>;
  presignGet(key: string, ttlSeconds: number): Promise<string>;
  delete(key: string): Promise<void>;
}

const MAX_EXTENSION_LENGTH = 16;

/**
 * Generates a storage key: 128 random bits as hex plus the original
 * extension, lowercased. Extensions that are not plain alphanumerics
 * are dropped so the key stays URL-safe.
 */
export function generateObjectKey(filename: string): string {
  const id = randomUUID().replace(/-/g, '');
  const ext = extname(filename).toLowerCase();

  if (ext.length > 1 && ext.length <= MAX_EXTENSION_LENGTH && /^\.[a-z0-9]+$/.test(ext)) {
    return `${id}${ext}`;
  }
  return id;
}
