import { resolveStorage } from '../config/StorageResolver';
import { BackupConfig, JobConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { RetentionManager as IRetentionManager, RetentionResult } from '../interfaces/RetentionManager';
import { StorageBackend } from '../interfaces/StorageBackend';
import { parseDuration } from '../utils/duration';
import { formatError, toError } from '../utils/errors';
import { StorageBackendFactory } from './StorageFactory';

export class InvalidRetentionSpecError extends Error {
  constructor(
    message: string,
    public readonly retention: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'InvalidRetentionSpecError';
  }
}

/**
 * RetentionManager deletes artifacts older than a job's retention span.
 * It only touches items strictly older than the cutoff, so it can run while
 * a newer dump of the same job is still in flight.
 */
export class RetentionManager implements IRetentionManager {
  constructor(
    private readonly config: BackupConfig,
    private readonly storageFactory: StorageBackendFactory,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async enforce(backend: StorageBackend, retention: string): Promise<RetentionResult> {
    const maxAgeSeconds = parseRetention(retention);
    const now = this.now();
    const cutoff = new Date(now.getTime() - maxAgeSeconds * 1000);

    this.logger.info(`Applying retention policy ${retention} to ${backend.describe()}`, {
      cutoff: cutoff.toISOString(),
    });

    const result = await backend.cleanupOlderThan(maxAgeSeconds, now);

    if (result.errors.length > 0) {
      this.logger.warn(
        `Retention cleanup had ${result.errors.length} errors. Some backups may not have been deleted.`
      );
    }

    return { ...result, cutoff };
  }

  async enforceForJob(job: JobConfig): Promise<RetentionResult | null> {
    if (!job.retention) {
      this.logger.debug(`No retention policy configured for '${job.name}', keeping all backups`);
      return null;
    }

    // Fail on a bad policy before connecting to storage
    parseRetention(job.retention);

    const storage = await this.storageFactory(resolveStorage(job, this.config.storages), job.name);
    const result = await this.enforce(storage, job.retention);
    this.logger.logRetentionCleanup(job.name, result.deletedCount, job.retention);
    return result;
  }
}

function parseRetention(retention: string): number {
  try {
    return parseDuration(retention);
  } catch (error) {
    throw new InvalidRetentionSpecError(
      `Invalid retention policy '${retention}': ${formatError(error)}`,
      retention,
      toError(error)
    );
  }
}
