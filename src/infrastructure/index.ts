export { loadConfig, DEFAULT_ALLOWED_MIME_TYPES } from './config.js';
export type { AppConfig, StorageConfig, AttachmentLimits } from './config.js';
export { createDbClient, ensureSchema, dbPlugin, events, attachments } from './db/index.js';
export type { Database } from './db/index.js';
export { S3StorageGateway, createS3Client, generateObjectKey, storagePlugin } from './storage/index.js';
export type { StorageGateway, PutObjectInput } from './storage/index.js';
