export { generateObjectKey } from './storage-gateway.js';
export type { StorageGateway, PutObjectInput } from './storage-gateway.js';
export { S3StorageGateway, createS3Client } from './s3-storage-gateway.js';
export { default as storagePlugin } from './storage-plugin.js';
