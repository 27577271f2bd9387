const mockSend = jest.fn();

// Mock AWS SDK
jest.mock('@aws-sdk/client-s3', () => ({
  S3Client: jest.fn(() => ({ send: (...args: unknown[]) => mockSend(...args) })),
  PutObjectCommand: jest.fn((input: unknown) => ({ kind: 'put', input })),
  ListObjectsV2Command: jest.fn((input: unknown) => ({ kind: 'list', input })),
  DeleteObjectCommand: jest.fn((input: unknown) => ({ kind: 'delete', input })),
  HeadBucketCommand: jest.fn((input: unknown) => ({ kind: 'head', input })),
}));

import { S3Client as AWSS3Client } from '@aws-sdk/client-s3';
import { S3Client } from '../src/clients/S3Client';
import { S3StorageConfig } from '../src/interfaces/BackupConfig';
import { createMockLogger } from './helpers';

const config: S3StorageConfig = {
  driver: 's3',
  bucket: 'test-bucket',
  region: 'eu-west-1',
  prefix: 'backups/',
  accessKeyId: 'test-access-key',
  secretAccessKey: 'test-secret-key',
  filenamePrefix: '',
};

describe('S3Client', () => {
  const logger = createMockLogger();

  beforeEach(() => {
    jest.clearAllMocks();
    mockSend.mockReset();
  });

  describe('constructor', () => {
    it('should create the SDK client with explicit credentials', () => {
      new S3Client(config, logger);

      expect(jest.mocked(AWSS3Client)).toHaveBeenCalledWith({
        region: 'eu-west-1',
        credentials: {
          accessKeyId: 'test-access-key',
          secretAccessKey: 'test-secret-key',
        },
      });
    });

    it('should use the ambient credential chain and a custom endpoint', () => {
      new S3Client(
        { ...config, accessKeyId: undefined, secretAccessKey: undefined, endpoint: 'http://localhost:9000' },
        logger
      );

      expect(jest.mocked(AWSS3Client)).toHaveBeenCalledWith({
        region: 'eu-west-1',
        endpoint: 'http://localhost:9000',
        forcePathStyle: true,
      });
    });
  });

  describe('putObject', () => {
    it('should send the object with gzip content type', async () => {
      mockSend.mockResolvedValue({});
      const body = Buffer.from('payload');

      await new S3Client(config, logger).putObject('backups/a.dump.gz', body);

      expect(mockSend).toHaveBeenCalledWith({
        kind: 'put',
        input: {
          Bucket: 'test-bucket',
          Key: 'backups/a.dump.gz',
          Body: body,
          ContentLength: 7,
          ContentType: 'application/gzip',
        },
      });
    });
  });

  describe('listObjects', () => {
    it('should map objects and skip entries without key or timestamp', async () => {
      const modified = new Date('2024-01-01T00:00:00Z');
      mockSend.mockResolvedValue({
        Contents: [
          { Key: 'backups/a.dump.gz', LastModified: modified, Size: 12 },
          { Key: 'backups/b.dump.gz' },
          { LastModified: modified },
        ],
        IsTruncated: true,
        NextContinuationToken: 'next-token',
      });

      const page = await new S3Client(config, logger).listObjects('backups/', 'this-token');

      expect(mockSend).toHaveBeenCalledWith({
        kind: 'list',
        input: { Bucket: 'test-bucket', Prefix: 'backups/', ContinuationToken: 'this-token' },
      });
      expect(page).toEqual({
        objects: [{ key: 'backups/a.dump.gz', lastModified: modified, size: 12 }],
        nextContinuationToken: 'next-token',
      });
    });

    it('should omit the continuation token on the last page', async () => {
      mockSend.mockResolvedValue({ IsTruncated: false, NextContinuationToken: 'stale' });

      const page = await new S3Client(config, logger).listObjects('backups/');

      expect(page).toEqual({ objects: [] });
    });
  });

  describe('deleteObject and headBucket', () => {
    it('should address the configured bucket', async () => {
      mockSend.mockResolvedValue({});
      const client = new S3Client(config, logger);

      await client.deleteObject('backups/old.dump.gz');
      await client.headBucket();

      expect(mockSend.mock.calls).toEqual([
        [{ kind: 'delete', input: { Bucket: 'test-bucket', Key: 'backups/old.dump.gz' } }],
        [{ kind: 'head', input: { Bucket: 'test-bucket' } }],
      ]);
    });
  });

  describe('retry logic', () => {
    it('should retry transient failures with backoff', async () => {
      mockSend
        .mockRejectedValueOnce(new Error('socket hang up'))
        .mockRejectedValueOnce(new Error('socket hang up'))
        .mockResolvedValueOnce({});

      await new S3Client(config, logger, { baseDelayMs: 1 }).deleteObject('backups/a.dump.gz');

      expect(mockSend).toHaveBeenCalledTimes(3);
      expect(logger.warn).toHaveBeenNthCalledWith(
        1,
        'Attempt 1 failed for delete object backups/a.dump.gz: Error: socket hang up. Retrying in 1ms...'
      );
      expect(logger.warn).toHaveBeenNthCalledWith(
        2,
        'Attempt 2 failed for delete object backups/a.dump.gz: Error: socket hang up. Retrying in 2ms...'
      );
    });

    it('should give up after the maximum number of attempts', async () => {
      mockSend.mockRejectedValue(new Error('socket hang up'));

      await expect(
        new S3Client(config, logger, { baseDelayMs: 1 }).deleteObject('backups/a.dump.gz')
      ).rejects.toThrow('Failed to delete object backups/a.dump.gz after 3 attempts. Last error: socket hang up');
      expect(mockSend).toHaveBeenCalledTimes(3);
    });

    it('should not retry access errors', async () => {
      const denied = Object.assign(new Error('Access Denied'), { name: 'AccessDenied' });
      mockSend.mockRejectedValue(denied);

      await expect(new S3Client(config, logger, { baseDelayMs: 1 }).putObject('k', Buffer.from('x'))).rejects.toBe(
        denied
      );
      expect(mockSend).toHaveBeenCalledTimes(1);
    });

    it('should not retry other client errors', async () => {
      const badRequest = Object.assign(new Error('Bad Request'), { $metadata: { httpStatusCode: 400 } });
      mockSend.mockRejectedValue(badRequest);

      await expect(new S3Client(config, logger, { baseDelayMs: 1 }).listObjects('backups/')).rejects.toBe(badRequest);
      expect(mockSend).toHaveBeenCalledTimes(1);
    });
  });
});
