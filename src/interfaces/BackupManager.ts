import { JobConfig } from './BackupConfig';

/**
 * Result of a delivered backup run
 */
export interface BackupResult {
  /** Name of the job that produced the backup */
  jobName: string;

  /** Name of the delivered artifact */
  fileName: string;

  /** Size of the artifact in bytes */
  fileSize: number;

  /** Where the artifact ended up (absolute path or s3:// URI) */
  location: string;

  /** Duration of the run in milliseconds */
  duration: number;
}

export interface BackupRunOptions {
  /** Aborts the dump producer and skips delivery */
  signal?: AbortSignal;

  /** Fixed timestamp for the artifact name; defaults to now */
  timestamp?: Date;
}

/**
 * Produces one job's artifact in a private scratch area and delivers it
 */
export interface BackupExecutor {
  executeBackup(job: JobConfig, options?: BackupRunOptions): Promise<BackupResult>;
}
