import { Dirent, promises as fs } from 'fs';
import { join, resolve } from 'path';
import { LocalStorageConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { CleanupResult, StorageBackend } from '../interfaces/StorageBackend';
import { errorCode, formatError, toError } from '../utils/errors';
import { CleanupError, DeliveryError, StorageListingError, StorageUnreachableError } from './StorageErrors';

/**
 * Local filesystem storage backend
 */
export class LocalStorage implements StorageBackend {
  private readonly basePath: string;

  private constructor(
    config: LocalStorageConfig,
    private readonly logger: Logger
  ) {
    this.basePath = resolve(config.path);
  }

  /**
   * Create the backend, making sure the base directory exists
   */
  static async create(config: LocalStorageConfig, logger: Logger): Promise<LocalStorage> {
    const storage = new LocalStorage(config, logger);
    try {
      await fs.mkdir(storage.basePath, { recursive: true });
    } catch (error) {
      throw new StorageUnreachableError(
        `Failed to create backup directory ${storage.basePath}: ${formatError(error)}`,
        toError(error)
      );
    }
    return storage;
  }

  describe(): string {
    return this.basePath;
  }

  /**
   * Move the artifact into the base directory. Falls back to copy + remove
   * when scratch space and destination are on different devices.
   */
  async deliver(artifactPath: string, filename: string): Promise<string> {
    const destination = join(this.basePath, filename);

    try {
      await fs.rename(artifactPath, destination);
    } catch (error) {
      if (errorCode(error) !== 'EXDEV') {
        throw new DeliveryError(
          `Failed to move ${artifactPath} to ${destination}: ${formatError(error)}`,
          toError(error)
        );
      }
      this.logger.debug(`Cross-device move to ${destination}, copying instead`);
      await this.copyAcrossDevices(artifactPath, destination);
    }

    this.logger.info(`Backup file available at: ${destination}`);
    return destination;
  }

  async cleanupOlderThan(maxAgeSeconds: number, now: Date = new Date()): Promise<CleanupResult> {
    const cutoff = now.getTime() - maxAgeSeconds * 1000;
    const result: CleanupResult = { deletedCount: 0, totalCount: 0, deletedKeys: [], errors: [] };

    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.basePath, { withFileTypes: true });
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        this.logger.debug(`Backup path does not exist: ${this.basePath}`);
        return result;
      }
      throw new StorageListingError(
        `Failed to read backup directory ${this.basePath}: ${formatError(error)}`,
        toError(error)
      );
    }

    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }

      const filePath = join(this.basePath, entry.name);
      result.totalCount++;

      try {
        const stats = await fs.stat(filePath);
        // Strictly older only; an entry exactly at the cutoff is kept
        if (stats.mtimeMs >= cutoff) {
          continue;
        }
        await fs.unlink(filePath);
        result.deletedCount++;
        result.deletedKeys.push(filePath);
        this.logger.info(`Deleted old backup: ${filePath}`);
      } catch (error) {
        const cleanupError = new CleanupError(
          `Failed to delete backup ${filePath}: ${formatError(error)}`,
          filePath,
          toError(error)
        );
        result.errors.push(cleanupError.message);
        this.logger.warn(cleanupError.message);
      }
    }

    return result;
  }

  private async copyAcrossDevices(source: string, destination: string): Promise<void> {
    // Copy under a temporary name so a half-written file never carries the final name
    const partial = `${destination}.partial`;
    try {
      await fs.copyFile(source, partial);
      await fs.rename(partial, destination);
    } catch (error) {
      await fs.rm(partial, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(`Failed to remove partial copy ${partial}: ${formatError(cleanupError)}`);
      });
      throw new DeliveryError(
        `Failed to copy ${source} to ${destination}: ${formatError(error)}`,
        toError(error)
      );
    }

    try {
      await fs.unlink(source);
    } catch (error) {
      this.logger.warn(`Failed to remove source after copy ${source}: ${formatError(error)}`);
    }
  }
}
