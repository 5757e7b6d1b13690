import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  S3Client,
  PutObjectCommand,
  DeleteObjectCommand,
  HeadBucketCommand,
  CreateBucketCommand,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { S3StorageGateway } from '../../src/infrastructure/storage/s3-storage-gateway.js';
import { generateObjectKey } from '../../src/infrastructure/storage/storage-gateway.js';
import { TransientStorageError } from '../../src/domain/index.js';

function s3Error(status: number): S3ServiceException {
  return new S3ServiceException({
    name: status === 404 ? 'NotFound' : 'Forbidden',
    $fault: 'client',
    $metadata: { httpStatusCode: status },
    message: `HTTP ${status}`,
  });
}

describe('generateObjectKey', () => {
  it('is 32 hex characters plus the lowercased extension', () => {
    expect(generateObjectKey('Holiday.JPG')).toMatch(/^[0-9a-f]{32}\.jpg$/);
  });

  it('omits the extension when the filename has none', () => {
    expect(generateObjectKey('README')).toMatch(/^[0-9a-f]{32}$/);
  });

  it('drops extensions that are not plain alphanumerics', () => {
    expect(generateObjectKey('notes.t xt')).toMatch(/^[0-9a-f]{32}$/);
    expect(generateObjectKey('archive.tar.gz')).toMatch(/^[0-9a-f]{32}\.gz$/);
  });

  it('never repeats', () => {
    const keys = new Set(Array.from({ length: 1000 }, () => generateObjectKey('a.txt')));
    expect(keys.size).toBe(1000);
  });
});

describe('S3StorageGateway', () => {
  let client: S3Client;
  let gateway: S3StorageGateway;

  beforeEach(() => {
    client = new S3Client({
      region: 'us-east-1',
      endpoint: 'http://localhost:9000',
      forcePathStyle: true,
      credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
    });
    gateway = new S3StorageGateway(client, 'test-bucket');
  });

  describe('put', () => {
    it('uploads under a generated key and returns it', async () => {
      const send = vi.spyOn(client, 'send').mockImplementation(async () => ({}));

      const key = await gateway.put({
        body: Buffer.from('hello'),
        filename: 'note.txt',
        contentType: 'text/plain',
        size: 5,
      });

      expect(key).toMatch(/^[0-9a-f]{32}\.txt$/);
      const command = send.mock.calls[0]?.[0];
      expect(command).toBeInstanceOf(PutObjectCommand);
      expect(command?.input).toMatchObject({
        Bucket: 'test-bucket',
        Key: key,
        ContentType: 'text/plain',
        ContentLength: 5,
      });
    });

    it('wraps SDK failures in TransientStorageError without retrying', async () => {
      const cause = new Error('socket hang up');
      const send = vi.spyOn(client, 'send').mockImplementation(async () => {
        throw cause;
      });

      const err = await gateway
        .put({ body: Buffer.from('x'), filename: 'note.txt', contentType: 'text/plain', size: 1 })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransientStorageError);
      expect(err).toMatchObject({ message: 'Failed to upload note.txt: socket hang up', cause });
      expect(send).toHaveBeenCalledTimes(1);
    });
  });

  describe('delete', () => {
    it('sends DeleteObject for the key', async () => {
      const send = vi.spyOn(client, 'send').mockImplementation(async () => ({}));

      await gateway.delete('abc.txt');

      const command = send.mock.calls[0]?.[0];
      expect(command).toBeInstanceOf(DeleteObjectCommand);
      expect(command?.input).toEqual({ Bucket: 'test-bucket', Key: 'abc.txt' });
    });

    it('wraps SDK failures in TransientStorageError', async () => {
      vi.spyOn(client, 'send').mockImplementation(async () => {
        throw new Error('boom');
      });

      await expect(gateway.delete('abc.txt')).rejects.toBeInstanceOf(TransientStorageError);
    });
  });

  describe('presignGet', () => {
    it('signs a GET URL for the key with the requested expiry', async () => {
      const url = await gateway.presignGet('abc.txt', 900);

      expect(url.startsWith('http://localhost:9000/test-bucket/abc.txt?')).toBe(true);
      expect(url).toContain('X-Amz-Expires=900');
      expect(url).toContain('X-Amz-Signature=');
    });
  });

  describe('ensureBucket', () => {
    it('does nothing when the bucket exists', async () => {
      const send = vi.spyOn(client, 'send').mockImplementation(async () => ({}));

      await expect(gateway.ensureBucket()).resolves.toBe(false);
      expect(send).toHaveBeenCalledTimes(1);
      expect(send.mock.calls[0]?.[0]).toBeInstanceOf(HeadBucketCommand);
    });

    it('creates the bucket when HEAD returns 404', async () => {
      const send = vi.spyOn(client, 'send')
        .mockImplementationOnce(async () => {
          throw s3Error(404);
        })
        .mockImplementationOnce(async () => ({}));

      await expect(gateway.ensureBucket()).resolves.toBe(true);
      expect(send.mock.calls[1]?.[0]).toBeInstanceOf(CreateBucketCommand);
    });

    it('fails on any other HEAD error', async () => {
      const send = vi.spyOn(client, 'send').mockImplementation(async () => {
        throw s3Error(403);
      });

      await expect(gateway.ensureBucket()).rejects.toBeInstanceOf(TransientStorageError);
      expect(send).toHaveBeenCalledTimes(1);
    });
  });
});
