import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { resolveStorage } from '../config/StorageResolver';
import { BackupConfig, ConnectionConfig, JobConfig } from '../interfaces/BackupConfig';
import { BackupExecutor, BackupResult, BackupRunOptions } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { formatError, toError } from '../utils/errors';
import { createDumpPipeline } from './DumpPipeline';
import { ProcessSpawner, resolveProducerBinary, spawnProcess } from './DumpProducer';
import { createStorageBackendFactory, StorageBackendFactory } from './StorageFactory';

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class BackupAbortedError extends Error {
  constructor(public readonly jobName: string) {
    super(`Backup '${jobName}' was aborted before delivery`);
    this.name = 'BackupAbortedError';
  }
}

/**
 * Reject connection parameters a producer could never use
 */
export function validateConnection(connection: ConnectionConfig): void {
  if (!connection.host.trim()) {
    throw new ValidationError('Database host cannot be empty', 'host');
  }

  if (!connection.database.trim()) {
    throw new ValidationError('Database name cannot be empty', 'database');
  }

  if (!connection.username.trim()) {
    throw new ValidationError('Database username cannot be empty', 'username');
  }
}

export interface BackupManagerOptions {
  storageFactory?: StorageBackendFactory;
  spawner?: ProcessSpawner;
}

/**
 * BackupManager runs one job end to end: resolve storage, dump into a
 * private scratch directory, deliver, then remove the scratch directory
 * whatever happened.
 */
export class BackupManager implements BackupExecutor {
  private readonly storageFactory: StorageBackendFactory;
  private readonly spawner: ProcessSpawner;

  constructor(
    private readonly config: BackupConfig,
    private readonly logger: Logger,
    options: BackupManagerOptions = {}
  ) {
    this.storageFactory = options.storageFactory ?? createStorageBackendFactory(logger);
    this.spawner = options.spawner ?? spawnProcess;
  }

  async executeBackup(job: JobConfig, options: BackupRunOptions = {}): Promise<BackupResult> {
    const startTime = Date.now();

    // Validation, resolution and backend setup happen before anything touches disk
    validateConnection(job.connection);
    const storageConfig = resolveStorage(job, this.config.storages);
    const storage = await this.storageFactory(storageConfig, job.name);

    const scratchDir = await this.createScratchDirectory();
    this.logger.logBackupStart(job.name, {
      driver: job.driver,
      mode: job.mode,
      database: job.connection.database,
      storage: storage.describe(),
    });

    try {
      const pipeline = createDumpPipeline(job.mode, this.spawner, this.logger);
      const artifact = await pipeline.run({
        driver: job.driver,
        connection: job.connection,
        binaryPath: resolveProducerBinary(job.driver, job.binaryPath, this.config.settings.binaries),
        parallelJobs: job.parallelJobs,
        scratchDir,
        filenamePrefix: storageConfig.filenamePrefix,
        timestamp: options.timestamp ?? new Date(),
        signal: options.signal,
      });

      if (options.signal?.aborted) {
        throw new BackupAbortedError(job.name);
      }

      const { size } = await fs.stat(artifact.path);
      const location = await storage.deliver(artifact.path, artifact.filename);
      const duration = Date.now() - startTime;

      this.logger.logBackupComplete(job.name, artifact.filename, size, location, duration);

      return {
        jobName: job.name,
        fileName: artifact.filename,
        fileSize: size,
        location,
        duration,
      };
    } catch (error) {
      this.logger.logBackupError(job.name, 'execute', toError(error), {
        duration: Date.now() - startTime,
      });
      throw error;
    } finally {
      await this.removeScratchDirectory(scratchDir);
    }
  }

  private async createScratchDirectory(): Promise<string> {
    const root = this.config.settings.scratchDirectory ?? tmpdir();
    const scratchDir = join(root, `db-dump-${uuidv4()}`);
    await fs.mkdir(scratchDir, { recursive: true });
    return scratchDir;
  }

  private async removeScratchDirectory(scratchDir: string): Promise<void> {
    try {
      await fs.rm(scratchDir, { recursive: true, force: true });
      this.logger.debug(`Cleaned up scratch directory: ${scratchDir}`);
    } catch (error) {
      this.logger.warn(`Failed to cleanup scratch directory ${scratchDir}: ${formatError(error)}`);
    }
  }
}
