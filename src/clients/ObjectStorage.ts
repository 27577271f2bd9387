import { promises as fs } from 'fs';
import { S3StorageConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { S3Client, S3ObjectPage } from '../interfaces/S3Client';
import { CleanupResult, StorageBackend } from '../interfaces/StorageBackend';
import { formatError, toError } from '../utils/errors';
import {
  CleanupError,
  DeliveryError,
  StorageListingError,
  StorageUnreachableError,
  UploadError,
} from './StorageErrors';

/**
 * S3 (or S3-compatible) storage backend
 */
export class ObjectStorage implements StorageBackend {
  private readonly bucket: string;
  private readonly prefix: string;

  private constructor(
    config: S3StorageConfig,
    private readonly client: S3Client,
    private readonly logger: Logger
  ) {
    this.bucket = config.bucket;
    this.prefix = config.prefix;
  }

  /**
   * Create the backend after verifying the bucket is reachable
   */
  static async connect(config: S3StorageConfig, client: S3Client, logger: Logger): Promise<ObjectStorage> {
    logger.debug(`Verifying S3 bucket access: ${config.bucket}`);
    try {
      await client.headBucket();
    } catch (error) {
      throw new StorageUnreachableError(
        `Failed to access S3 bucket ${config.bucket}: ${formatError(error)}`,
        toError(error)
      );
    }
    logger.info(`Successfully connected to S3 bucket: ${config.bucket}`);
    return new ObjectStorage(config, client, logger);
  }

  describe(): string {
    return `s3://${this.bucket}/${this.prefix}`;
  }

  /**
   * Upload under `{prefix}{filename}`. The location uses the `s3://bucket/key`
   * form that AWS tooling accepts, for every S3-compatible endpoint.
   */
  async deliver(artifactPath: string, filename: string): Promise<string> {
    const key = `${this.prefix}${filename}`;
    this.logger.info(`Uploading backup to S3: s3://${this.bucket}/${key}`);

    let body: Buffer;
    try {
      body = await fs.readFile(artifactPath);
    } catch (error) {
      throw new DeliveryError(`Failed to read backup file ${artifactPath}: ${formatError(error)}`, toError(error));
    }

    try {
      await this.client.putObject(key, body);
    } catch (error) {
      throw new UploadError(`Failed to upload to S3: ${key}: ${formatError(error)}`, key, toError(error));
    }

    const location = `s3://${this.bucket}/${key}`;
    this.logger.info(`Successfully uploaded to S3: ${location}`);
    return location;
  }

  async cleanupOlderThan(maxAgeSeconds: number, now: Date = new Date()): Promise<CleanupResult> {
    const cutoff = now.getTime() - maxAgeSeconds * 1000;
    const result: CleanupResult = { deletedCount: 0, totalCount: 0, deletedKeys: [], errors: [] };

    this.logger.info(`Listing objects in bucket: ${this.bucket}, prefix: ${this.prefix}`);

    let continuationToken: string | undefined;
    do {
      let page: S3ObjectPage;
      try {
        page = await this.client.listObjects(this.prefix, continuationToken);
      } catch (error) {
        throw new StorageListingError(
          `Failed to list S3 objects under s3://${this.bucket}/${this.prefix}: ${formatError(error)}`,
          toError(error)
        );
      }

      for (const obj of page.objects) {
        result.totalCount++;
        if (obj.lastModified.getTime() >= cutoff) {
          continue;
        }

        try {
          await this.client.deleteObject(obj.key);
          result.deletedCount++;
          result.deletedKeys.push(obj.key);
          this.logger.info(`Deleted old S3 object: s3://${this.bucket}/${obj.key}`);
        } catch (error) {
          const cleanupError = new CleanupError(
            `Failed to delete S3 object ${obj.key}: ${formatError(error)}`,
            obj.key,
            toError(error)
          );
          result.errors.push(cleanupError.message);
          this.logger.warn(cleanupError.message);
        }
      }

      continuationToken = page.nextContinuationToken;
    } while (continuationToken);

    this.logger.info(`S3 retention cleanup removed ${result.deletedCount} object(s)`);
    return result;
  }
}
