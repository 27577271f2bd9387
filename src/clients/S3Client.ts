import {
  S3Client as AWSS3Client,
  S3ClientConfig,
  PutObjectCommand,
  ListObjectsV2Command,
  DeleteObjectCommand,
  HeadBucketCommand,
  PutObjectCommandInput,
  ListObjectsV2CommandInput,
  DeleteObjectCommandInput,
} from '@aws-sdk/client-s3';
import { S3StorageConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { S3Client as IS3Client, S3Object, S3ObjectPage } from '../interfaces/S3Client';
import { formatError, toError } from '../utils/errors';

export interface S3ClientOptions {
  maxRetries?: number;
  /** First backoff delay; doubles per attempt */
  baseDelayMs?: number;
}

const NON_RETRYABLE_CODES = [
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'AccessDenied',
  'NoSuchBucket',
  'InvalidBucketName',
  'NotFound',
  'Forbidden',
];

/**
 * S3Client implementation using AWS SDK v3, bound to one bucket.
 * Works against S3-compatible services through a custom endpoint.
 */
export class S3Client implements IS3Client {
  private client: AWSS3Client;
  private bucket: string;
  private maxRetries: number;
  private baseDelay: number;

  constructor(
    config: S3StorageConfig,
    private readonly logger: Logger,
    options: S3ClientOptions = {}
  ) {
    const clientConfig: S3ClientConfig = {
      region: config.region,
    };

    // Explicit credentials override the ambient provider chain
    if (config.accessKeyId && config.secretAccessKey) {
      clientConfig.credentials = {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      };
    }

    // Use custom endpoint if provided (for S3-compatible services)
    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
      clientConfig.forcePathStyle = true; // Required for MinIO and other S3-compatible services
    }

    this.client = new AWSS3Client(clientConfig);
    this.bucket = config.bucket;
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelay = options.baseDelayMs ?? 1000;
  }

  async putObject(key: string, body: Buffer): Promise<void> {
    await this.withRetry(async () => {
      const uploadParams: PutObjectCommandInput = {
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentLength: body.length,
        ContentType: 'application/gzip',
      };

      await this.client.send(new PutObjectCommand(uploadParams));
    }, `upload object ${key}`);
  }

  async listObjects(prefix: string, continuationToken?: string): Promise<S3ObjectPage> {
    return this.withRetry(async () => {
      const listParams: ListObjectsV2CommandInput = {
        Bucket: this.bucket,
        Prefix: prefix,
      };
      if (continuationToken) {
        listParams.ContinuationToken = continuationToken;
      }

      const response = await this.client.send(new ListObjectsV2Command(listParams));

      const objects: S3Object[] = [];
      for (const obj of response.Contents ?? []) {
        if (obj.Key && obj.LastModified) {
          objects.push({ key: obj.Key, lastModified: obj.LastModified, size: obj.Size ?? 0 });
        }
      }

      const page: S3ObjectPage = { objects };
      if (response.IsTruncated && response.NextContinuationToken) {
        page.nextContinuationToken = response.NextContinuationToken;
      }
      return page;
    }, `list objects with prefix ${prefix}`);
  }

  async deleteObject(key: string): Promise<void> {
    await this.withRetry(async () => {
      const deleteParams: DeleteObjectCommandInput = {
        Bucket: this.bucket,
        Key: key,
      };

      await this.client.send(new DeleteObjectCommand(deleteParams));
    }, `delete object ${key}`);
  }

  async headBucket(): Promise<void> {
    await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
  }

  /**
   * Execute an operation with exponential backoff retry logic
   */
  private async withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (this.isNonRetryableError(error)) {
          throw error;
        }

        if (attempt >= this.maxRetries) {
          throw new Error(
            `Failed to ${operationName} after ${this.maxRetries} attempts. Last error: ${toError(error).message}`
          );
        }

        const delay = this.baseDelay * Math.pow(2, attempt - 1);
        this.logger.warn(
          `Attempt ${attempt} failed for ${operationName}: ${formatError(error)}. Retrying in ${delay}ms...`
        );

        await this.sleep(delay);
      }
    }
  }

  /**
   * Check if an error should not be retried
   */
  private isNonRetryableError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) {
      return false;
    }

    const name = 'name' in error ? error.name : undefined;
    const code = 'Code' in error ? error.Code : undefined;
    if (
      (typeof name === 'string' && NON_RETRYABLE_CODES.includes(name)) ||
      (typeof code === 'string' && NON_RETRYABLE_CODES.includes(code))
    ) {
      return true;
    }

    const metadata = '$metadata' in error ? error.$metadata : undefined;
    if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
      const status = metadata.httpStatusCode;
      return typeof status === 'number' && status >= 400 && status < 500;
    }

    return false;
  }

  /**
   * Sleep for specified milliseconds
   */
  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
