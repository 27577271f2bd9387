import { assertStorageComplete } from '../config/StorageResolver';
import { S3StorageConfig, StorageConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { S3Client as IS3Client } from '../interfaces/S3Client';
import { StorageBackend } from '../interfaces/StorageBackend';
import { LocalStorage } from './LocalStorage';
import { ObjectStorage } from './ObjectStorage';
import { S3Client } from './S3Client';

export type StorageBackendFactory = (config: StorageConfig, jobName: string) => Promise<StorageBackend>;

export type S3ClientFactory = (config: S3StorageConfig, logger: Logger) => IS3Client;

const defaultS3ClientFactory: S3ClientFactory = (config, logger) => new S3Client(config, logger);

/**
 * Build the backend for a resolved storage config, dispatching on its driver
 */
export function createStorageBackendFactory(
  logger: Logger,
  s3ClientFactory: S3ClientFactory = defaultS3ClientFactory
): StorageBackendFactory {
  return async (config, jobName) => {
    assertStorageComplete(config, jobName);

    switch (config.driver) {
      case 'local':
        return LocalStorage.create(config, logger);
      case 's3':
        return ObjectStorage.connect(config, s3ClientFactory(config, logger), logger);
    }
  };
}
