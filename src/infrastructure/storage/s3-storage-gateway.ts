import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadBucketCommand,
  CreateBucketCommand,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { TransientStorageError } from '../../domain/index.js';
import type { StorageConfig } from '../config.js';
import { generateObjectKey } from './storage-gateway.js';
import type { PutObjectInput, StorageGateway } from './storage-gateway.js';

/** Builds an S3 client for AWS or any S3-compatible endpoint (MinIO, RustFS). */
export function createS3Client(config: StorageConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * StorageGateway backed by one bucket of an S3-compatible store.
 *
 * The client is injected so a single instance is shared by all requests.
 */
export class S3StorageGateway implements StorageGateway {
  constructor(
    private readonly client: S3Client,
    readonly bucket: string,
  ) {}

  async put(input: PutObjectInput): Promise<string> {
    const key = generateObjectKey(input.filename);

    try {
      await this.client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: input.body,
        ContentType: input.contentType,
        ContentLength: input.size,
      }));
    } catch (err: unknown) {
      throw new TransientStorageError(`Failed to upload ${input.filename}: ${errorMessage(err)}`, { cause: err });
    }

    return key;
  }

  async presignGet(key: string, ttlSeconds: number): Promise<string> {
    try {
      return await getSignedUrl(
        this.client,
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
        { expiresIn: ttlSeconds },
      );
    } catch (err: unknown) {
      throw new TransientStorageError(`Failed to presign ${key}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
    } catch (err: unknown) {
      throw new TransientStorageError(`Failed to delete ${key}: ${errorMessage(err)}`, { cause: err });
    }
  }

  /**
   * Creates the bucket when HEAD reports it missing.
   * Returns true if the bucket was created.
   */
  async ensureBucket(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return false;
    } catch (err: unknown) {
      if (!(err instanceof S3ServiceException) || err.$metadata.httpStatusCode !== 404) {
        throw new TransientStorageError(`Bucket ${this.bucket} is not reachable: ${errorMessage(err)}`, { cause: err });
      }
    }

    try {
      await this.client.send(new CreateBucketCommand({ Bucket: this.bucket }));
    } catch (err: unknown) {
      throw new TransientStorageError(`Failed to create bucket ${this.bucket}: ${errorMessage(err)}`, { cause: err });
    }
    return true;
  }
}
